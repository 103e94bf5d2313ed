import type { IHandler, HandlerResult, HandlerScope } from '../dispatcher/IHandler.js';

export interface FanOutOptions<T> {
  name: string;
  /** Context key holding the items to expand. */
  source: string;
  build: (item: T, index: number) => IHandler;
  /** Narrows each context item; items it rejects fail the handler. */
  accepts: (item: unknown) => item is T;
}

/**
 * Expands a list held in the event context into one queued handler per
 * item. The queued handlers run after everything already in the queue.
 */
export class FanOutHandler<T> implements IHandler {
  readonly name: string;

  constructor(private readonly options: FanOutOptions<T>) {
    this.name = options.name;
  }

  execute(scope: HandlerScope): HandlerResult {
    const value = scope.context[this.options.source];
    if (!Array.isArray(value)) {
      return { success: false, message: `Context key "${this.options.source}" is not a list` };
    }

    const items: unknown[] = value;
    const rejected = items.findIndex((item) => !this.options.accepts(item));
    if (rejected !== -1) {
      return { success: false, message: `Item ${rejected} of "${this.options.source}" is not valid` };
    }

    const accepted = items.filter(this.options.accepts);
    accepted.forEach((item, index) => scope.enqueue(this.options.build(item, index)));

    return { success: true, message: `Queued ${accepted.length} handler(s)` };
  }
}
