import type { Site } from '../model/Site.js';
import type { Logger } from '../../infra/logger/logger.js';
import type { EventDescriptor, EventRegistry } from '../registry/EventRegistry.js';

/**
 * Outcome reported by a handler. `success` decides which bucket the
 * handler is filed into once it has run.
 */
export interface HandlerResult {
  success: boolean;
  message: string;
}

/**
 * What a handler may touch while it runs: the event's shared context,
 * its site, and the incomplete queue of the same run.
 */
export interface HandlerScope {
  readonly type: string;
  readonly context: Record<string, unknown>;
  readonly site?: Site;
  readonly registry: EventRegistry;
  readonly logger: Logger;

  /**
   * Append a handler to the tail of the incomplete queue. It runs in this
   * same dispatch, after everything already queued.
   */
  enqueue(handler: IHandler): void;

  /** Write a line to the event's output sink, if it has one. */
  write(line: string): void;
}

export interface IHandler {
  /** Identity reported in debug snapshots and log lines. */
  readonly name: string;

  /**
   * Perform the unit of work. Throwing is treated the same as returning
   * `{ success: false }` with the error's message.
   */
  execute(scope: HandlerScope): HandlerResult | Promise<HandlerResult>;
}

/**
 * Metadata for handler registration.
 * Handler classes export this as a static property.
 */
export interface HandlerMetadata {
  /** Name used by registry descriptors (`class`). */
  name: string;

  /**
   * Human-readable description of what this handler does.
   */
  description?: string;
}

/**
 * Handler class constructor with metadata. The descriptor that selected the
 * handler is passed in, so extra registry fields can parameterise it.
 */
export interface HandlerClass {
  new (descriptor: EventDescriptor): IHandler;
  readonly metadata: HandlerMetadata;
}
