import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { HandlerTimeoutError } from '../errors.js';
import { EventBus } from './bus.js';
import { createEvent, EventPriority, type BusEvent, type EventHandler } from './types.js';

function makeHandler(
  eventTypes: string[],
  opts: { name?: string; priority?: EventPriority; handle?: (event: BusEvent) => unknown } = {},
) {
  return {
    name: opts.name ?? eventTypes.join('+'),
    eventTypes,
    priority: opts.priority,
    handle: vi.fn((event: BusEvent): unknown => (opts.handle ? opts.handle(event) : 'ok')),
    onError: vi.fn(),
  } satisfies EventHandler;
}

describe('EventBus', () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus({ handlerTimeoutMs: 500, maxHistory: 1000 });
  });

  describe('registration', () => {
    it('sorts handlers of a type by priority, keeping registration order for ties', () => {
      const low = makeHandler(['x'], { name: 'low', priority: EventPriority.LOW });
      const normalA = makeHandler(['x'], { name: 'normal-a' });
      const critical = makeHandler(['x'], { name: 'critical', priority: EventPriority.CRITICAL });
      const normalB = makeHandler(['x'], { name: 'normal-b', priority: EventPriority.NORMAL });

      bus.registerHandler(low);
      bus.registerHandler(normalA);
      bus.registerHandler(critical);
      bus.registerHandler(normalB);

      expect(bus.getHandlers('x').map((h) => h.name)).toEqual([
        'critical',
        'normal-a',
        'normal-b',
        'low',
      ]);
    });

    it('registers a handler under every declared type', () => {
      const handler = makeHandler(['a', 'b']);
      bus.registerHandler(handler);
      expect(bus.getHandlers('a')).toEqual([handler]);
      expect(bus.getHandlers('b')).toEqual([handler]);
      expect(bus.registeredEventTypes).toEqual(['a', 'b']);
    });

    it('removes a handler from every declared type', async () => {
      const handler = makeHandler(['a', 'b']);
      const other = makeHandler(['b'], { name: 'other' });
      bus.registerHandler(handler);
      bus.registerHandler(other);

      bus.unregisterHandler(handler);

      expect(bus.getHandlers('a')).toEqual([]);
      expect(bus.getHandlers('b')).toEqual([other]);
      expect(bus.registeredEventTypes).toEqual(['b']);

      await bus.publishAndWait(createEvent('a', {}));
      await bus.publishAndWait(createEvent('b', {}));
      expect(handler.handle).not.toHaveBeenCalled();
      expect(other.handle).toHaveBeenCalledOnce();
    });

    it('ignores unregistering a handler that was never registered', () => {
      expect(() => bus.unregisterHandler(makeHandler(['nope']))).not.toThrow();
      expect(bus.registeredEventTypes).toEqual([]);
    });

    it('delivers twice to a handler registered twice', async () => {
      const handler = makeHandler(['x']);
      bus.registerHandler(handler);
      bus.registerHandler(handler);

      const outcomes = await bus.publishAndWait(createEvent('x', {}));

      expect(outcomes).toHaveLength(2);
      expect(handler.handle).toHaveBeenCalledTimes(2);
    });

    it('returns a copy from getHandlers', () => {
      bus.registerHandler(makeHandler(['x']));
      bus.getHandlers('x').pop();
      expect(bus.getHandlers('x')).toHaveLength(1);
    });
  });

  describe('publishAndWait', () => {
    it('returns one outcome per handler, in priority order, with the same event', async () => {
      const h2 = makeHandler(['x'], { name: 'h2', priority: EventPriority.LOW, handle: () => 2 });
      const h1 = makeHandler(['x'], { name: 'h1', priority: EventPriority.HIGH, handle: () => 1 });
      bus.registerHandler(h2);
      bus.registerHandler(h1);

      const event = createEvent('x', { n: 1 });
      const outcomes = await bus.publishAndWait(event);

      expect(outcomes).toEqual([
        { status: 'fulfilled', handler: 'h1', value: 1 },
        { status: 'fulfilled', handler: 'h2', value: 2 },
      ]);
      expect(h1.handle).toHaveBeenCalledWith(event);
      expect(h2.handle).toHaveBeenCalledWith(event);
    });

    it('resolves an empty list when no handler is registered, still recording history', async () => {
      const outcomes = await bus.publishAndWait(createEvent('y', {}));
      expect(outcomes).toEqual([]);
      expect(bus.getEventHistory()).toHaveLength(1);
      expect(bus.getEventHistory()[0].type).toBe('y');
    });

    it('starts all handlers before any of them finishes', async () => {
      const started: string[] = [];
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      bus.registerHandler(
        makeHandler(['x'], {
          name: 'slow',
          priority: EventPriority.HIGH,
          handle: async () => {
            started.push('slow');
            await gate;
          },
        }),
      );
      bus.registerHandler(
        makeHandler(['x'], {
          name: 'fast',
          handle: () => {
            started.push('fast');
            release();
          },
        }),
      );

      const outcomes = await bus.publishAndWait(createEvent('x', {}));

      expect(started).toEqual(['slow', 'fast']);
      expect(outcomes.map((o) => o.status)).toEqual(['fulfilled', 'fulfilled']);
    });
  });

  describe('handler failures', () => {
    it('isolates a throwing handler from its siblings', async () => {
      const error = new Error('boom');
      const failing = makeHandler(['x'], {
        name: 'failing',
        priority: EventPriority.HIGH,
        handle: () => {
          throw error;
        },
      });
      const healthy = makeHandler(['x'], { name: 'healthy' });
      bus.registerHandler(failing);
      bus.registerHandler(healthy);

      const event = createEvent('x', {});
      const outcomes = await bus.publishAndWait(event);

      expect(outcomes).toEqual([
        { status: 'rejected', handler: 'failing', error },
        { status: 'fulfilled', handler: 'healthy', value: 'ok' },
      ]);
      expect(failing.onError).toHaveBeenCalledOnce();
      expect(failing.onError).toHaveBeenCalledWith(event, error);
      expect(healthy.onError).not.toHaveBeenCalled();
    });

    it('captures rejected promises and non-Error throws', async () => {
      bus.registerHandler(makeHandler(['x'], { name: 'rejects', handle: () => Promise.reject(new Error('async boom')) }));
      bus.registerHandler(
        makeHandler(['x'], {
          name: 'throws-string',
          handle: () => {
            throw 'plain string';
          },
        }),
      );

      const outcomes = await bus.publishAndWait(createEvent('x', {}));

      expect(outcomes.map((o) => (o.status === 'rejected' ? o.error.message : null))).toEqual([
        'async boom',
        'plain string',
      ]);
    });

    it('survives a handler without onError and an onError that throws', async () => {
      bus.registerHandler({
        eventTypes: ['x'],
        handle: () => {
          throw new Error('no callback');
        },
      });
      const noisy = makeHandler(['x'], {
        name: 'noisy',
        handle: () => {
          throw new Error('first');
        },
      });
      noisy.onError.mockImplementation(() => {
        throw new Error('second');
      });
      bus.registerHandler(noisy);

      const outcomes = await bus.publishAndWait(createEvent('x', {}));

      expect(outcomes).toHaveLength(2);
      expect(outcomes[0]).toMatchObject({ status: 'rejected', handler: 'Object' });
      expect(outcomes[1]).toMatchObject({ status: 'rejected', handler: 'noisy' });
      expect(noisy.onError).toHaveBeenCalledOnce();
    });

    it('times out slow handlers without blocking others', async () => {
      const fastBus = new EventBus({ handlerTimeoutMs: 20 });
      const slow = makeHandler(['x'], { name: 'slow', handle: () => new Promise(() => {}) });
      const fast = makeHandler(['x'], { name: 'fast' });
      fastBus.registerHandler(slow);
      fastBus.registerHandler(fast);

      const outcomes = await fastBus.publishAndWait(createEvent('x', {}));

      expect(outcomes[0].status).toBe('rejected');
      if (outcomes[0].status === 'rejected') {
        expect(outcomes[0].error).toBeInstanceOf(HandlerTimeoutError);
        expect(outcomes[0].error.message).toBe('Handler "slow" timed out after 20ms on "x"');
      }
      expect(outcomes[1]).toEqual({ status: 'fulfilled', handler: 'fast', value: 'ok' });
      expect(slow.onError).toHaveBeenCalledOnce();
    });
  });

  describe('middleware', () => {
    it('cancels delivery when a middleware returns null', async () => {
      const handler = makeHandler(['blocked.test']);
      bus.registerHandler(handler);
      bus.addMiddleware((event) => (event.type.startsWith('blocked.') ? null : event));

      const outcomes = await bus.publishAndWait(createEvent('blocked.test', {}));

      expect(outcomes).toEqual([]);
      expect(handler.handle).not.toHaveBeenCalled();
      expect(bus.getEventHistory('blocked.test')).toHaveLength(1);
    });

    it('stops the chain at the vetoing middleware', async () => {
      const after = vi.fn((event: BusEvent) => event);
      bus.addMiddleware(() => null);
      bus.addMiddleware(after);

      await bus.publishAndWait(createEvent('x', {}));

      expect(after).not.toHaveBeenCalled();
    });

    it('runs middleware in registration order and lets them replace the event', async () => {
      const order: string[] = [];
      const handler = makeHandler(['x']);
      bus.registerHandler(handler);
      bus.addMiddleware((event) => {
        order.push('first');
        return createEvent(event.type, { ...event.payload, tagged: true });
      });
      bus.addMiddleware(async (event) => {
        order.push('second');
        return event;
      });

      await bus.publishAndWait(createEvent('x', { n: 1 }));

      expect(order).toEqual(['first', 'second']);
      expect(handler.handle.mock.calls[0][0].payload).toEqual({ n: 1, tagged: true });
    });

    it('logs a throwing middleware and continues with the next one', async () => {
      const handler = makeHandler(['x']);
      const next = vi.fn((event: BusEvent) => event);
      bus.registerHandler(handler);
      bus.addMiddleware(() => {
        throw new Error('middleware boom');
      });
      bus.addMiddleware(next);

      const outcomes = await bus.publishAndWait(createEvent('x', {}));

      expect(next).toHaveBeenCalledOnce();
      expect(outcomes).toHaveLength(1);
      expect(handler.handle).toHaveBeenCalledOnce();
    });

    it('routes to the handlers of a type rewritten by middleware', async () => {
      const original = makeHandler(['x'], { name: 'original' });
      const rerouted = makeHandler(['z'], { name: 'rerouted' });
      bus.registerHandler(original);
      bus.registerHandler(rerouted);
      bus.addMiddleware((event) => createEvent('z', event.payload));

      const outcomes = await bus.publishAndWait(createEvent('x', {}));

      expect(outcomes.map((o) => o.handler)).toEqual(['rerouted']);
      expect(original.handle).not.toHaveBeenCalled();
    });
  });

  describe('publish (fire-and-forget)', () => {
    it('returns before handlers run and tracks the background work', async () => {
      const handler = makeHandler(['x']);
      bus.registerHandler(handler);

      const result = bus.publish(createEvent('x', {}));

      expect(result).toBeUndefined();
      expect(handler.handle).not.toHaveBeenCalled();
      expect(bus.backgroundTaskCount).toBe(1);
      expect(bus.getEventHistory()).toHaveLength(1);

      await expect(bus.waitForBackgroundTasks()).resolves.toBe(true);
      expect(handler.handle).toHaveBeenCalledOnce();
      expect(bus.backgroundTaskCount).toBe(0);
    });

    it('reports background handler failures only through onError', async () => {
      const error = new Error('background boom');
      const handler = makeHandler(['x'], {
        handle: () => {
          throw error;
        },
      });
      bus.registerHandler(handler);

      bus.publish(createEvent('x', {}));
      await bus.waitForBackgroundTasks();

      expect(handler.onError).toHaveBeenCalledOnce();
      expect(handler.onError.mock.calls[0][1]).toBe(error);
    });

    it('honours middleware vetoes', async () => {
      const handler = makeHandler(['blocked.test']);
      bus.registerHandler(handler);
      bus.addMiddleware((event) => (event.type.startsWith('blocked.') ? null : event));

      bus.publish(createEvent('blocked.test', {}));
      await bus.waitForBackgroundTasks();

      expect(handler.handle).not.toHaveBeenCalled();
    });

    it('gives up waiting after the timeout', async () => {
      const stuckBus = new EventBus({ handlerTimeoutMs: 0 });
      stuckBus.registerHandler(makeHandler(['x'], { handle: () => new Promise(() => {}) }));

      stuckBus.publish(createEvent('x', {}));

      await expect(stuckBus.waitForBackgroundTasks(20)).resolves.toBe(false);
      expect(stuckBus.backgroundTaskCount).toBe(1);
    });

    it('resolves immediately when nothing is pending', async () => {
      await expect(bus.waitForBackgroundTasks()).resolves.toBe(true);
    });
  });

  describe('history', () => {
    it('never exceeds capacity and evicts the oldest first', async () => {
      const small = new EventBus({ maxHistory: 3 });
      for (const type of ['e0', 'e1', 'e2', 'e3']) {
        await small.publishAndWait(createEvent(type, {}));
      }

      expect(small.historySize).toBe(3);
      expect(small.getEventHistory().map((e) => e.type)).toEqual(['e1', 'e2', 'e3']);
      expect(small.getEventHistory('e0')).toEqual([]);
    });

    it('filters by type and returns the most recent entries up to the limit', async () => {
      for (const n of [1, 2, 3]) {
        await bus.publishAndWait(createEvent('a', { n }));
        await bus.publishAndWait(createEvent('b', { n }));
      }

      expect(bus.getEventHistory('a', 2).map((e) => e.payload.n)).toEqual([2, 3]);
      expect(bus.getEventHistory(undefined, 3).map((e) => e.type)).toEqual(['b', 'a', 'b']);
      expect(bus.getEventHistory(undefined, 0)).toHaveLength(6);
    });

    it('defaults to the 100 most recent entries', async () => {
      for (let n = 0; n < 120; n++) {
        await bus.publishAndWait(createEvent('a', { n }));
      }

      const history = bus.getEventHistory();
      expect(history).toHaveLength(100);
      expect(history[0].payload.n).toBe(20);
    });

    it('filters on an empty type instead of returning everything', async () => {
      await bus.publishAndWait(createEvent('a', {}));
      expect(bus.getEventHistory('')).toEqual([]);
      expect(bus.getEventHistory(undefined)).toHaveLength(1);
    });

    it('clears history', async () => {
      await bus.publishAndWait(createEvent('a', {}));
      bus.clearHistory();
      expect(bus.getEventHistory()).toEqual([]);
    });

    it('prunes events older than the TTL', async () => {
      const ttlBus = new EventBus({ historyTtlMs: 1000 });
      const now = Date.now();
      await ttlBus.publishAndWait(createEvent('old', {}, { createdAt: new Date(now - 5000) }));
      await ttlBus.publishAndWait(createEvent('fresh', {}, { createdAt: new Date(now) }));

      expect(ttlBus.pruneExpiredEvents(now)).toBe(1);
      expect(ttlBus.getEventHistory().map((e) => e.type)).toEqual(['fresh']);
    });

    it('keeps everything when the TTL is disabled', async () => {
      const keepBus = new EventBus({ historyTtlMs: 0 });
      await keepBus.publishAndWait(createEvent('old', {}, { createdAt: new Date(0) }));
      expect(keepBus.pruneExpiredEvents()).toBe(0);
      expect(keepBus.historySize).toBe(1);
    });
  });

  describe('cleanup loop', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('prunes expired history on each tick until stopped', async () => {
      const ttlBus = new EventBus({ historyTtlMs: 1000 });
      await ttlBus.publishAndWait(createEvent('a', {}));

      ttlBus.startCleanupLoop(500);
      ttlBus.startCleanupLoop(500);

      vi.advanceTimersByTime(600);
      expect(ttlBus.historySize).toBe(1);

      vi.advanceTimersByTime(400);
      expect(ttlBus.historySize).toBe(0);

      ttlBus.stopCleanupLoop();
      await ttlBus.publishAndWait(createEvent('b', {}));
      vi.advanceTimersByTime(5000);
      expect(ttlBus.historySize).toBe(1);
    });
  });
});
