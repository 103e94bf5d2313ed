import { loadConfig } from '../infra/config/config.js';
import { createLogger, type Logger } from '../infra/logger/logger.js';
import { Dispatcher } from '../core/dispatcher/dispatcher.js';
import { HandlerRegistry } from '../core/dispatcher/handlerRegistry.js';
import { loggingMiddleware } from '../core/dispatcher/middleware/loggingMiddleware.js';
import { PlatformEvent } from '../core/event/PlatformEvent.js';
import { getRegistry } from '../core/registry/registrySource.js';
import { loadHandlerModules } from '../core/registry/handlerModuleLoader.js';
import { registerSiteGroupHandlers } from '../apps/siteGroup/index.js';
import type { OutputSink } from '../core/event/OutputSink.js';
import type { Site } from '../core/model/Site.js';

let defaultHandlers: HandlerRegistry | null = null;

/**
 * Handler table every default event resolves against. Built-in apps are
 * registered on first use.
 */
export function getDefaultHandlers(): HandlerRegistry {
  if (!defaultHandlers) {
    defaultHandlers = new HandlerRegistry(createLogger(loadConfig()));
    registerSiteGroupHandlers(defaultHandlers);
  }
  return defaultHandlers;
}

export function resetDefaultHandlers(): void {
  defaultHandlers = null;
}

/**
 * Registers handler classes that the default registry locates by path.
 * Call once at startup, before creating events.
 */
export async function bootstrapHandlers(): Promise<string[]> {
  const cfg = loadConfig();
  return loadHandlerModules(getRegistry(), getDefaultHandlers(), {
    root: cfg.registry.handlerRoot,
    logger: createLogger(cfg),
  });
}

export interface CreateEventOptions {
  site?: Site;
  registry?: unknown;
  handlers?: HandlerRegistry;
  logger?: Logger;
}

/**
 * Creates an event wired with the platform defaults: the process registry,
 * the default handler table and a dispatcher configured from config.
 *
 *   const event = createEvent('site_group_provision', { sites });
 *   await event.run();
 *   console.log(event.debug());
 */
export function createEvent(
  type: string,
  context: Record<string, unknown> = {},
  output?: OutputSink,
  options: CreateEventOptions = {},
): PlatformEvent {
  const cfg = loadConfig();
  const logger = options.logger ?? createLogger(cfg);

  const dispatcher = new Dispatcher(logger, {
    stopOnFailure: cfg.dispatcher.stopOnFailure,
    maxHandlers: cfg.dispatcher.maxHandlers,
  });
  dispatcher.use((handler, scope, next) => loggingMiddleware(handler, scope, next, logger));

  return new PlatformEvent({
    type,
    registry: options.registry ?? getRegistry(),
    handlers: options.handlers ?? getDefaultHandlers(),
    context,
    site: options.site,
    dispatcher,
    logger,
    output,
  });
}
