import { describe, it, expect, vi } from 'vitest';
import {
  formatResultLog,
  formatStartLog,
  loggingMiddleware,
} from '../../../src/core/dispatcher/middleware/loggingMiddleware.js';
import { Dispatcher } from '../../../src/core/dispatcher/dispatcher.js';
import { HandlerRegistry } from '../../../src/core/dispatcher/handlerRegistry.js';
import { PlatformEvent } from '../../../src/core/event/PlatformEvent.js';
import { TrackedHandler } from '../../../src/core/event/TrackedHandler.js';
import { createSite } from '../../../src/core/model/Site.js';
import type { Logger } from '../../../src/infra/logger/logger.js';
import { mockLogger, recorder } from '../helpers.js';

function makeEvent(logger: Logger = mockLogger): PlatformEvent {
  const dispatcher = new Dispatcher(logger);
  dispatcher.use((handler, scope, next) => loggingMiddleware(handler, scope, next, logger));
  return new PlatformEvent({
    type: 'site_install',
    registry: {},
    handlers: new HandlerRegistry(),
    site: createSite('s1', 'Site One', { url: 'https://one.test' }),
    dispatcher,
    logger,
  });
}

describe('loggingMiddleware', () => {
  it('should format start lines with the event type, handler and site', () => {
    const event = makeEvent();
    const tracked = new TrackedHandler(recorder('InstallHandler'));

    expect(formatStartLog(tracked, event.scope())).toBe('[START] [site_install] handler=InstallHandler site=s1');
  });

  it('should format results and truncate long messages', () => {
    const event = makeEvent();
    const tracked = new TrackedHandler(recorder('InstallHandler'));

    expect(formatResultLog(tracked, event.scope(), { success: false, message: 'disk full' }, 12)).toBe(
      '[FAIL] [site_install] handler=InstallHandler ms=12 message="disk full"',
    );
    expect(formatResultLog(tracked, event.scope(), { success: true, message: 'x'.repeat(70) }, 0)).toBe(
      `[OK] [site_install] handler=InstallHandler ms=0 message="${'x'.repeat(60)}…(10 more)"`,
    );
  });

  it('should log successes as info and failures as warn', async () => {
    const info = vi.fn();
    const warn = vi.fn();
    const event = makeEvent({ ...mockLogger, info, warn });
    event.pushHandler(recorder('good'));
    event.pushHandler(recorder('bad', 'fail'));

    await event.run();

    expect(info.mock.calls.map(([, line]) => String(line).split(' ')[0])).toEqual(['[START]', '[OK]', '[START]']);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][1])).toMatch(/^\[FAIL\] \[site_install\] handler=bad ms=\d+ message="bad failed"$/);
  });

  it('should log a FAIL line for a handler that throws', async () => {
    const info = vi.fn();
    const warn = vi.fn();
    const event = makeEvent({ ...mockLogger, info, warn });
    event.pushHandler(recorder('boom', 'throw'));

    const summary = await event.run();

    expect(summary.failed).toBe(1);
    expect(info.mock.calls.map(([, line]) => String(line))).toEqual(['[START] [site_install] handler=boom site=s1']);
    expect(warn).toHaveBeenCalledTimes(2);
    expect(String(warn.mock.calls[0][1])).toMatch(
      /^\[FAIL\] \[site_install\] handler=boom ms=\d+ message="boom exploded"$/,
    );
    expect(warn.mock.calls[1][1]).toBe('boom threw: boom exploded');
  });
});

describe('TrackedHandler', () => {
  it('should move from pending through running to its outcome', () => {
    const tracked = new TrackedHandler(recorder('step'));
    expect(tracked.status).toBe('pending');

    tracked.markStarted(100);
    expect(tracked.status).toBe('running');

    tracked.markCompleted({ success: false, message: 'nope' }, 120);
    expect(tracked.status).toBe('failed');
    expect(tracked.completed).toBe(120);
    expect(tracked.message).toBe('nope');
  });
});
