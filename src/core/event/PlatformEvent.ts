import type { Site } from '../model/Site.js';
import type { IHandler, HandlerScope } from '../dispatcher/IHandler.js';
import type { HandlerRegistry } from '../dispatcher/handlerRegistry.js';
import type { OutputSink } from './OutputSink.js';
import { Dispatcher, type DispatchSummary } from '../dispatcher/dispatcher.js';
import { EventRegistry } from '../registry/EventRegistry.js';
import { HANDLER_BUCKETS, TrackedHandler, isHandlerBucket, type HandlerBucket } from './TrackedHandler.js';
import { DispatchInProgressError, HandlerStateError, IncompatibleHandlerError } from '../errors.js';
import { nullLogger, type Logger } from '../../infra/logger/logger.js';

export interface PlatformEventOptions {
  type: string;
  /** Registry data, or a snapshot taken earlier. A missing `events` list is treated as empty. */
  registry: unknown;
  /** Factory table the registry's class names resolve against. */
  handlers: HandlerRegistry;
  context?: Record<string, unknown>;
  site?: Site;
  dispatcher?: Dispatcher;
  logger?: Logger;
  output?: OutputSink;
}

export interface DebugEntry {
  class: string;
  started: number | null;
  completed: number | null;
  message: string;
  success: boolean | null;
}

export interface DebugSnapshot {
  handlers: Record<HandlerBucket, DebugEntry[]>;
}

/**
 * An event encapsulates a dispatcher and the handlers registered for its
 * type. Handlers share the event's context and can queue further handlers
 * while the event runs.
 *
 *   const event = new PlatformEvent({ type: 'site_duplication_scrub', registry, handlers, context });
 *   const summary = await event.run();
 */
export class PlatformEvent {
  readonly type: string;
  readonly context: Record<string, unknown>;
  readonly site?: Site;
  readonly registry: EventRegistry;
  readonly dispatcher: Dispatcher;
  readonly logger: Logger;
  output?: OutputSink;

  private readonly handlerTable: HandlerRegistry;
  private readonly buckets: Record<HandlerBucket, TrackedHandler[]> = {
    incomplete: [],
    complete: [],
    failed: [],
  };
  /** One lifecycle record per handler instance, for the life of the event. */
  private readonly records = new WeakMap<IHandler, TrackedHandler>();
  private dispatching = false;

  constructor(options: PlatformEventOptions) {
    this.type = options.type;
    this.registry = EventRegistry.from(options.registry);
    this.handlerTable = options.handlers;
    this.context = options.context ?? {};
    this.site = options.site;
    this.logger = options.logger ?? nullLogger;
    this.dispatcher = options.dispatcher ?? new Dispatcher(this.logger);
    this.output = options.output;
  }

  /**
   * Instantiates every handler registered for this event's type and queues
   * them in registry order. Calling this twice queues them twice.
   *
   * @throws HandlerResolutionError if a descriptor names an unknown class;
   *   nothing is queued in that case
   */
  loadHandlers(): void {
    const handlers = this.registry.lookup(this.type).map((descriptor) => this.handlerTable.resolve(descriptor));
    for (const handler of handlers) {
      this.pushHandler(handler, 'incomplete');
    }
    this.logger.debug('event', `Loaded ${handlers.length} handler(s) for ${this.type}`);
  }

  /**
   * Appends a handler to a bucket. A handler instance keeps one lifecycle
   * record per event, so an instance that is already filed, or that has
   * already run, is rejected like its record would be.
   */
  pushHandler(handler: IHandler | TrackedHandler, bucket: string = 'incomplete'): TrackedHandler {
    if (!isHandlerBucket(bucket)) {
      throw new IncompatibleHandlerError(bucket);
    }

    const tracked = this.recordFor(handler);
    if (tracked.bucket !== null) {
      throw new HandlerStateError(`Handler "${tracked.name}" is already in the ${tracked.bucket} bucket`);
    }
    if (bucket === 'incomplete' && tracked.started !== null) {
      throw new HandlerStateError(`Handler "${tracked.name}" has already run and cannot be queued again`);
    }

    this.buckets[bucket].push(tracked);
    tracked.bucket = bucket;
    this.records.set(tracked.handler, tracked);
    return tracked;
  }

  private recordFor(handler: IHandler | TrackedHandler): TrackedHandler {
    if (!(handler instanceof TrackedHandler)) {
      return this.records.get(handler) ?? new TrackedHandler(handler);
    }
    const existing = this.records.get(handler.handler);
    if (existing && existing !== handler) {
      throw new HandlerStateError(`Handler "${handler.name}" is already tracked by this event`);
    }
    return handler;
  }

  /** Shifts the oldest handler off a bucket. */
  popHandler(bucket: string = 'incomplete'): TrackedHandler | undefined {
    if (!isHandlerBucket(bucket)) {
      throw new IncompatibleHandlerError(bucket);
    }

    const tracked = this.buckets[bucket].shift();
    if (tracked) tracked.bucket = null;
    return tracked;
  }

  enqueue(handler: IHandler): TrackedHandler {
    return this.pushHandler(handler, 'incomplete');
  }

  handlers(bucket: HandlerBucket): readonly TrackedHandler[] {
    return [...this.buckets[bucket]];
  }

  count(bucket: HandlerBucket): number {
    return this.buckets[bucket].length;
  }

  write(line: string): void {
    this.output?.writeln(line);
  }

  /** The view of this event handed to each handler as it executes. */
  scope(): HandlerScope {
    return {
      type: this.type,
      context: this.context,
      site: this.site,
      registry: this.registry,
      logger: this.logger,
      enqueue: (handler) => {
        this.enqueue(handler);
      },
      write: (line) => this.write(line),
    };
  }

  get isDispatching(): boolean {
    return this.dispatching;
  }

  /** Claimed by the dispatcher for the length of one drain. */
  beginDispatch(): void {
    if (this.dispatching) {
      throw new DispatchInProgressError(this.type);
    }
    this.dispatching = true;
  }

  endDispatch(): void {
    this.dispatching = false;
  }

  /**
   * @throws DispatchInProgressError if a run of this event has not finished;
   *   nothing is loaded in that case
   */
  async run(): Promise<DispatchSummary> {
    if (this.dispatching) {
      throw new DispatchInProgressError(this.type);
    }
    this.loadHandlers();
    return this.dispatcher.dispatch(this);
  }

  debug(): DebugSnapshot {
    const snapshot: DebugSnapshot = { handlers: { incomplete: [], complete: [], failed: [] } };
    for (const bucket of HANDLER_BUCKETS) {
      snapshot.handlers[bucket] = this.buckets[bucket].map((tracked) => ({
        class: tracked.name,
        started: tracked.started,
        completed: tracked.completed,
        message: tracked.message,
        success: tracked.success,
      }));
    }
    return snapshot;
  }
}
