import type { IHandler, HandlerResult, HandlerScope } from '../dispatcher/IHandler.js';

export type HandlerFn = (scope: HandlerScope) => HandlerResult | Promise<HandlerResult>;

/**
 * Adapts a plain function to the handler contract.
 */
export class FunctionHandler implements IHandler {
  constructor(
    readonly name: string,
    private readonly fn: HandlerFn,
  ) {}

  execute(scope: HandlerScope): HandlerResult | Promise<HandlerResult> {
    return this.fn(scope);
  }
}
