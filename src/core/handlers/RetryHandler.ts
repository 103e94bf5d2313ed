import type { IHandler, HandlerResult, HandlerScope } from '../dispatcher/IHandler.js';
import { DispatchError, errorMessage } from '../errors.js';

export interface RetryOptions {
  /** Builds a fresh inner handler for every attempt. */
  create: () => IHandler;
  /** Total attempts, including this one. */
  attempts: number;
}

/**
 * Runs an inner handler and, when it fails with attempts left, queues a new
 * RetryHandler around a freshly built instance. The dispatcher itself never
 * retries; this is how a workflow opts in.
 */
export class RetryHandler implements IHandler {
  readonly name: string;
  private readonly inner: IHandler;

  constructor(private readonly options: RetryOptions) {
    this.inner = options.create();
    this.name = `Retry(${this.inner.name})`;
  }

  get attemptsLeft(): number {
    return this.options.attempts - 1;
  }

  async execute(scope: HandlerScope): Promise<HandlerResult> {
    let result: HandlerResult;
    try {
      result = await this.inner.execute(scope);
    } catch (err) {
      if (err instanceof DispatchError) throw err;
      result = { success: false, message: errorMessage(err) };
    }

    if (result.success || this.attemptsLeft <= 0) return result;

    scope.enqueue(new RetryHandler({ create: this.options.create, attempts: this.attemptsLeft }));
    return {
      success: false,
      message: `${result.message} (retry queued, ${this.attemptsLeft} left)`,
    };
  }
}
