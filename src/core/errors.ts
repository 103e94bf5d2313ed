/**
 * Failures of the dispatch machinery itself. These always escalate to the
 * caller of `run()`; a handler's own domain failure is never one of these.
 */
export class DispatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Push or pop on a bucket other than incomplete / complete / failed. */
export class IncompatibleHandlerError extends DispatchError {
  constructor(public readonly bucket: string) {
    super(`The handler type "${bucket}" is incompatible with this event.`);
  }
}

/** A tracked handler moved in a way that would break bucket exclusivity. */
export class HandlerStateError extends DispatchError {}

export class HandlerResolutionError extends DispatchError {
  constructor(
    public readonly handlerClass: string,
    reason: string,
  ) {
    super(`Unable to resolve handler "${handlerClass}": ${reason}`);
  }
}

export class InvalidRegistryError extends DispatchError {}

export class HandlerLimitExceededError extends DispatchError {
  constructor(public readonly limit: number) {
    super(`Dispatch exceeded the limit of ${limit} handler executions`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** `run()` or `dispatch()` called while the same event is still draining. */
export class DispatchInProgressError extends DispatchError {
  constructor(public readonly eventType: string) {
    super(`Event "${eventType}" is already being dispatched`);
  }
}
