import type { Logger } from '../../src/infra/logger/logger.js';
import type { HandlerResult, HandlerScope, IHandler } from '../../src/core/dispatcher/IHandler.js';
import { FunctionHandler } from '../../src/core/handlers/FunctionHandler.js';

// Mock logger
export const mockLogger: Logger = {
  info: () => {},
  debug: () => {},
  warn: () => {},
  error: () => {},
};

/** Deterministic clock: 1, 2, 3, ... */
export function counterClock(): () => number {
  let t = 0;
  return () => ++t;
}

export function orderOf(context: Record<string, unknown>): string[] {
  const value = context.order;
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export function record(scope: HandlerScope, name: string): void {
  scope.context.order = [...orderOf(scope.context), name];
}

/**
 * Handler that appends its name to `context.order` and then reports the
 * given outcome.
 */
export function recorder(
  name: string,
  outcome: 'ok' | 'fail' | 'throw' = 'ok',
  after?: (scope: HandlerScope) => void,
): IHandler {
  return new FunctionHandler(name, (scope): HandlerResult => {
    record(scope, name);
    after?.(scope);
    if (outcome === 'throw') throw new Error(`${name} exploded`);
    return outcome === 'ok'
      ? { success: true, message: `${name} done` }
      : { success: false, message: `${name} failed` };
  });
}
