/**
 * Event Bus
 * Routes events to handlers registered by type. Middleware runs first, in
 * registration order; handlers for a type are kept sorted by priority and run
 * in parallel, each isolated behind its own timeout and error callback.
 */

import {
  EVENT_HISTORY_SIZE,
  EVENT_HISTORY_TTL_MS,
  HANDLER_TIMEOUT_MS,
} from '../config.js';
import { HandlerTimeoutError, toError, withTimeout } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import {
  EventPriority,
  handlerName,
  priorityName,
  type BusEvent,
  type EventHandler,
  type HandlerOutcome,
  type Middleware,
} from './types.js';

export interface EventBusOptions {
  /** Events kept in history before the oldest is evicted. */
  maxHistory?: number;
  /** Age after which pruneExpiredEvents() drops an event. 0 keeps them. */
  historyTtlMs?: number;
  /** Per-handler timeout. 0 disables it. */
  handlerTimeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_CLEANUP_INTERVAL_MS = 30 * 60 * 1000;

export class EventBus {
  private handlers = new Map<string, EventHandler[]>();
  private middleware: Middleware[] = [];
  private history: BusEvent[] = [];
  private backgroundTasks = new Set<Promise<void>>();
  private cleanupTimer: NodeJS.Timeout | null = null;

  private readonly maxHistory: number;
  private readonly historyTtlMs: number;
  private readonly handlerTimeoutMs: number;
  private readonly log: Logger;

  constructor(opts: EventBusOptions = {}) {
    this.maxHistory = opts.maxHistory ?? EVENT_HISTORY_SIZE;
    this.historyTtlMs = opts.historyTtlMs ?? EVENT_HISTORY_TTL_MS;
    this.handlerTimeoutMs = opts.handlerTimeoutMs ?? HANDLER_TIMEOUT_MS;
    this.log = (opts.logger ?? rootLogger).child({ module: 'event-bus' });
  }

  registerHandler(handler: EventHandler): void {
    for (const type of handler.eventTypes) {
      let list = this.handlers.get(type);
      if (!list) {
        list = [];
        this.handlers.set(type, list);
      }
      list.push(handler);
      // Array#sort is stable: equal priorities keep registration order
      list.sort((a, b) => priorityOf(a) - priorityOf(b));
    }

    this.log.info(
      { handler: handlerName(handler), eventTypes: handler.eventTypes },
      'Registered event handler',
    );
  }

  unregisterHandler(handler: EventHandler): void {
    for (const type of handler.eventTypes) {
      const list = this.handlers.get(type);
      if (!list) continue;
      const index = list.indexOf(handler);
      if (index === -1) continue;
      list.splice(index, 1);
      if (list.length === 0) this.handlers.delete(type);
    }

    this.log.debug({ handler: handlerName(handler) }, 'Unregistered event handler');
  }

  addMiddleware(middleware: Middleware): void {
    this.middleware.push(middleware);
    this.log.info({ middleware: middleware.name || 'anonymous' }, 'Added event middleware');
  }

  /**
   * Publish and wait for every handler to settle. Resolves with one outcome
   * per handler in priority order; never rejects.
   */
  async publishAndWait(event: BusEvent): Promise<HandlerOutcome[]> {
    this.record(event);
    return this.dispatch(event);
  }

  /**
   * Fire-and-forget publish. Returns immediately; failures are only visible
   * through each handler's onError and the log.
   */
  publish(event: BusEvent): void {
    this.record(event);

    const task = this.dispatch(event).then(
      () => undefined,
      (err: unknown) => {
        // dispatch() contains handler and middleware errors; reaching this is a bug
        this.log.error({ err, eventType: event.type }, 'Background dispatch failed');
      },
    );
    this.backgroundTasks.add(task);
    void task.finally(() => this.backgroundTasks.delete(task));
  }

  /** Wait for pending fire-and-forget publishes. Resolves false on timeout. */
  async waitForBackgroundTasks(timeoutMs = 5000): Promise<boolean> {
    if (this.backgroundTasks.size === 0) return true;

    this.log.info({ pending: this.backgroundTasks.size }, 'Waiting for background event tasks');
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const drained = (async () => {
      // Handlers may publish again while we wait
      while (this.backgroundTasks.size > 0) {
        await Promise.allSettled([...this.backgroundTasks]);
      }
      return true as const;
    })();

    try {
      const done = await Promise.race([drained, timedOut]);
      if (!done) {
        this.log.warn({ pending: this.backgroundTasks.size, timeoutMs }, 'Background event tasks timed out');
      }
      return done;
    } finally {
      clearTimeout(timer);
    }
  }

  get backgroundTaskCount(): number {
    return this.backgroundTasks.size;
  }

  // --- History ---

  /** Most recent events, oldest first. limit = 0 returns everything. */
  getEventHistory(type?: string, limit = 100): BusEvent[] {
    const events = type !== undefined ? this.history.filter((e) => e.type === type) : [...this.history];
    return limit > 0 ? events.slice(-limit) : events;
  }

  clearHistory(): void {
    this.history = [];
    this.log.info('Event history cleared');
  }

  get historySize(): number {
    return this.history.length;
  }

  /** Drop history entries older than the TTL. Returns how many were removed. */
  pruneExpiredEvents(now = Date.now()): number {
    if (this.historyTtlMs <= 0 || this.history.length === 0) return 0;

    const cutoff = now - this.historyTtlMs;
    const before = this.history.length;
    this.history = this.history.filter((e) => e.createdAt.getTime() > cutoff);
    const removed = before - this.history.length;
    if (removed > 0) {
      this.log.debug({ removed, ttlMs: this.historyTtlMs }, 'Pruned expired events');
    }
    return removed;
  }

  startCleanupLoop(intervalMs = DEFAULT_CLEANUP_INTERVAL_MS): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => this.pruneExpiredEvents(), intervalMs);
    this.cleanupTimer.unref();
    this.log.info({ intervalMs }, 'Event cleanup loop started');
  }

  stopCleanupLoop(): void {
    if (!this.cleanupTimer) return;
    clearInterval(this.cleanupTimer);
    this.cleanupTimer = null;
    this.log.info('Event cleanup loop stopped');
  }

  // --- Introspection ---

  getHandlers(type: string): EventHandler[] {
    return [...(this.handlers.get(type) ?? [])];
  }

  get registeredEventTypes(): string[] {
    return [...this.handlers.keys()];
  }

  // --- Internals ---

  private record(event: BusEvent): void {
    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history.splice(0, this.history.length - this.maxHistory);
    }
  }

  private async dispatch(original: BusEvent): Promise<HandlerOutcome[]> {
    const event = await this.applyMiddleware(original);
    if (!event) {
      this.log.debug({ eventType: original.type }, 'Event cancelled by middleware');
      return [];
    }

    const handlers = this.getHandlers(event.type);
    if (handlers.length === 0) {
      this.log.debug({ eventType: event.type }, 'No handlers for event');
      return [];
    }

    this.log.debug(
      { eventType: event.type, handlers: handlers.length, priority: priorityName(event.priority) },
      'Publishing event',
    );

    return Promise.all(handlers.map((handler) => this.execute(handler, event)));
  }

  private async applyMiddleware(event: BusEvent): Promise<BusEvent | null> {
    let current = event;
    for (const middleware of [...this.middleware]) {
      try {
        const next = await middleware(current);
        if (!next) return null;
        current = next;
      } catch (err) {
        this.log.error(
          { err, middleware: middleware.name || 'anonymous', eventType: current.type },
          'Event middleware failed',
        );
      }
    }
    return current;
  }

  private async execute(handler: EventHandler, event: BusEvent): Promise<HandlerOutcome> {
    const name = handlerName(handler);
    try {
      const value = await withTimeout(
        Promise.resolve().then(() => handler.handle(event)),
        this.handlerTimeoutMs,
        () => new HandlerTimeoutError(name, event.type, this.handlerTimeoutMs),
      );
      return { status: 'fulfilled', handler: name, value };
    } catch (err) {
      const error = toError(err);
      this.log.error(
        { handler: name, eventType: event.type, err: error },
        'Handler execution failed',
      );
      await this.reportError(handler, event, error);
      return { status: 'rejected', handler: name, error };
    }
  }

  private async reportError(handler: EventHandler, event: BusEvent, error: Error): Promise<void> {
    if (!handler.onError) return;
    try {
      await handler.onError(event, error);
    } catch (err) {
      this.log.error(
        { handler: handlerName(handler), eventType: event.type, err },
        'Handler onError callback failed',
      );
    }
  }
}

function priorityOf(handler: EventHandler): EventPriority {
  return handler.priority ?? EventPriority.NORMAL;
}
