import { describe, it, expect } from 'vitest';
import { PlatformEvent } from '../../../src/core/event/PlatformEvent.js';
import { Dispatcher } from '../../../src/core/dispatcher/dispatcher.js';
import { HandlerRegistry } from '../../../src/core/dispatcher/handlerRegistry.js';
import { FunctionHandler, FanOutHandler, RetryHandler } from '../../../src/core/handlers/index.js';
import type { IHandler } from '../../../src/core/dispatcher/IHandler.js';
import { counterClock, mockLogger, orderOf, recorder } from '../helpers.js';

function makeEvent(context: Record<string, unknown> = {}): PlatformEvent {
  return new PlatformEvent({
    type: 'handlers',
    registry: {},
    handlers: new HandlerRegistry(),
    context,
    logger: mockLogger,
    dispatcher: new Dispatcher(mockLogger, { now: counterClock() }),
  });
}

const isString = (value: unknown): value is string => typeof value === 'string';

describe('FunctionHandler', () => {
  it('should report the function result under its name', async () => {
    const event = makeEvent({ who: 'world' });
    event.pushHandler(
      new FunctionHandler('greet', (scope) => ({ success: true, message: `hello ${String(scope.context.who)}` })),
    );

    await event.run();

    expect(event.debug().handlers.complete).toEqual([
      { class: 'greet', started: 1, completed: 2, message: 'hello world', success: true },
    ]);
  });

  it('should await async functions', async () => {
    const event = makeEvent();
    event.pushHandler(
      new FunctionHandler('later', async () => {
        await Promise.resolve();
        return { success: false, message: 'not yet' };
      }),
    );

    await event.run();

    expect(event.handlers('failed').map((h) => h.message)).toEqual(['not yet']);
  });
});

describe('FanOutHandler', () => {
  const fanOut = () =>
    new FanOutHandler<string>({
      name: 'fan',
      source: 'items',
      accepts: isString,
      build: (item) => recorder(`item:${item}`),
    });

  it('should queue one handler per item after the existing queue', async () => {
    const event = makeEvent({ items: ['a', 'b'] });
    event.pushHandler(fanOut());
    event.pushHandler(recorder('already-queued'));

    await event.run();

    expect(orderOf(event.context)).toEqual(['already-queued', 'item:a', 'item:b']);
    expect(event.handlers('complete')[0].message).toBe('Queued 2 handler(s)');
  });

  it('should fail when the context key is not a list', async () => {
    const event = makeEvent({ items: 'a' });
    event.pushHandler(fanOut());

    await event.run();

    expect(event.debug().handlers.failed.map((e) => e.message)).toEqual(['Context key "items" is not a list']);
  });

  it('should fail without queueing anything when an item is rejected', async () => {
    const event = makeEvent({ items: ['a', 2, 'c'] });
    event.pushHandler(fanOut());

    const summary = await event.run();

    expect(summary.executed).toBe(1);
    expect(event.debug().handlers.failed.map((e) => e.message)).toEqual(['Item 1 of "items" is not valid']);
  });
});

describe('RetryHandler', () => {
  it('should queue fresh attempts until one succeeds', async () => {
    let attempt = 0;
    const create = (): IHandler =>
      new FunctionHandler('flaky', () => {
        attempt++;
        return attempt < 2 ? { success: false, message: 'timeout' } : { success: true, message: 'done' };
      });
    const event = makeEvent();
    event.pushHandler(new RetryHandler({ create, attempts: 3 }));

    await event.run();

    expect(event.debug().handlers).toEqual({
      incomplete: [],
      complete: [{ class: 'Retry(flaky)', started: 3, completed: 4, message: 'done', success: true }],
      failed: [
        {
          class: 'Retry(flaky)',
          started: 1,
          completed: 2,
          message: 'timeout (retry queued, 2 left)',
          success: false,
        },
      ],
    });
  });

  it('should stop after the last attempt', async () => {
    const event = makeEvent();
    event.pushHandler(
      new RetryHandler({
        create: () =>
          new FunctionHandler('down', () => {
            throw new Error('connection refused');
          }),
        attempts: 2,
      }),
    );

    const summary = await event.run();

    expect(summary.executed).toBe(2);
    expect(event.handlers('failed').map((h) => h.message)).toEqual([
      'connection refused (retry queued, 1 left)',
      'connection refused',
    ]);
  });
});
