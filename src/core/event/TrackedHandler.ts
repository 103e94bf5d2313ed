import type { IHandler, HandlerResult } from '../dispatcher/IHandler.js';

export const HANDLER_BUCKETS = ['incomplete', 'complete', 'failed'] as const;

export type HandlerBucket = (typeof HANDLER_BUCKETS)[number];

export type HandlerStatus = 'pending' | 'running' | 'completed' | 'failed';

export function isHandlerBucket(value: string): value is HandlerBucket {
  return HANDLER_BUCKETS.some((bucket) => bucket === value);
}

/**
 * Lifecycle record for one handler instance within one event.
 * Timestamps are epoch milliseconds.
 */
export class TrackedHandler {
  started: number | null = null;
  completed: number | null = null;
  message = '';
  success: boolean | null = null;
  /** Bucket this record is filed in, or null while popped. */
  bucket: HandlerBucket | null = null;

  constructor(public readonly handler: IHandler) {}

  get name(): string {
    return this.handler.name;
  }

  get status(): HandlerStatus {
    if (this.started === null) return 'pending';
    if (this.completed === null) return 'running';
    return this.success ? 'completed' : 'failed';
  }

  markStarted(at: number): void {
    this.started = at;
  }

  markCompleted(result: HandlerResult, at: number): void {
    this.success = result.success;
    this.message = result.message;
    this.completed = at;
  }
}
