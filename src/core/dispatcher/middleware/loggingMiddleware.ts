import type { HandlerResult, HandlerScope } from '../IHandler.js';
import type { TrackedHandler } from '../../event/TrackedHandler.js';
import type { Logger } from '../../../infra/logger/logger.js';
import { errorMessage } from '../../errors.js';

/**
 * Truncate text to max length, show truncation indicator
 */
function truncateText(text: string, maxLen: number = 60): string {
  if (text.length <= maxLen) return text;
  return text.substring(0, maxLen) + '…(' + (text.length - maxLen) + ' more)';
}

/**
 * START format: [START] [EVENT_TYPE] handler=... site=...
 */
export function formatStartLog(handler: TrackedHandler, scope: HandlerScope): string {
  const fields = [`[START]`, `[${scope.type}]`, `handler=${handler.name}`];
  if (scope.site) fields.push(`site=${scope.site.id}`);
  return fields.join(' ');
}

/**
 * END format: [OK|FAIL] [EVENT_TYPE] handler=... ms=... message="..."
 */
export function formatResultLog(
  handler: TrackedHandler,
  scope: HandlerScope,
  result: HandlerResult,
  elapsedMs: number,
): string {
  return [
    result.success ? '[OK]' : '[FAIL]',
    `[${scope.type}]`,
    `handler=${handler.name}`,
    `ms=${elapsedMs}`,
    `message="${truncateText(result.message)}"`,
  ].join(' ');
}

/**
 * Logging middleware for the dispatcher.
 * Logs each handler as it starts and the outcome it reports. A handler that
 * throws is logged as a failure before the error moves on to the dispatcher.
 */
export async function loggingMiddleware(
  handler: TrackedHandler,
  scope: HandlerScope,
  next: () => Promise<HandlerResult>,
  logger: Logger,
): Promise<HandlerResult> {
  logger.info('dispatcher', formatStartLog(handler, scope));

  const startedAt = Date.now();
  let result: HandlerResult;
  try {
    result = await next();
  } catch (err) {
    logger.warn(
      'dispatcher',
      formatResultLog(handler, scope, { success: false, message: errorMessage(err) }, Date.now() - startedAt),
    );
    throw err;
  }

  const line = formatResultLog(handler, scope, result, Date.now() - startedAt);
  if (result.success) {
    logger.info('dispatcher', line);
  } else {
    logger.warn('dispatcher', line);
  }

  return result;
}
