export { PlatformEvent, type PlatformEventOptions, type DebugEntry, type DebugSnapshot } from './core/event/PlatformEvent.js';
export {
  TrackedHandler,
  HANDLER_BUCKETS,
  isHandlerBucket,
  type HandlerBucket,
  type HandlerStatus,
} from './core/event/TrackedHandler.js';
export { BufferedOutput, consoleOutput, type OutputSink } from './core/event/OutputSink.js';
export {
  Dispatcher,
  DEFAULT_MAX_HANDLERS,
  checkResult,
  type DispatcherOptions,
  type DispatchSummary,
  type MiddlewareFunc,
} from './core/dispatcher/dispatcher.js';
export { HandlerRegistry, type HandlerFactory } from './core/dispatcher/handlerRegistry.js';
export { loggingMiddleware } from './core/dispatcher/middleware/loggingMiddleware.js';
export type {
  IHandler,
  HandlerClass,
  HandlerMetadata,
  HandlerResult,
  HandlerScope,
} from './core/dispatcher/IHandler.js';
export { EventRegistry, type EventDescriptor, type RegistryData } from './core/registry/EventRegistry.js';
export { getRegistry, setRegistry, resetRegistry, readRegistryFile } from './core/registry/registrySource.js';
export { loadHandlerModules, isHandlerClass, type ModuleImporter } from './core/registry/handlerModuleLoader.js';
export * from './core/handlers/index.js';
export * from './core/errors.js';
export { createSite, type Site } from './core/model/Site.js';
export { createEvent, getDefaultHandlers, bootstrapHandlers, type CreateEventOptions } from './bootstrap/createEvent.js';
export { createLogger, nullLogger, type Logger, type LogLevel } from './infra/logger/logger.js';
export { loadConfig, resetConfig, type AppConfigRequired } from './infra/config/config.js';
