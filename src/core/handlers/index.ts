export { FunctionHandler, type HandlerFn } from './FunctionHandler.js';
export { FanOutHandler, type FanOutOptions } from './FanOutHandler.js';
export { RetryHandler, type RetryOptions } from './RetryHandler.js';
