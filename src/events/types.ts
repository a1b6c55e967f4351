/**
 * Event Bus Types
 * Event record, priorities and the handler/middleware contracts.
 */

import { InvalidEventError } from '../errors.js';

// --- Priority ---

export const EventPriority = {
  CRITICAL: 0,
  HIGH: 1,
  NORMAL: 2,
  LOW: 3,
} as const;

export type EventPriority = (typeof EventPriority)[keyof typeof EventPriority];

export type EventPriorityName = keyof typeof EventPriority;

const PRIORITY_NAMES: Record<EventPriority, EventPriorityName> = {
  0: 'CRITICAL',
  1: 'HIGH',
  2: 'NORMAL',
  3: 'LOW',
};

export function priorityName(priority: EventPriority): EventPriorityName {
  return PRIORITY_NAMES[priority];
}

// --- Event record ---

export type EntityId = string | number;

export type EventPayload = Record<string, unknown>;

export interface BusEvent<P extends EventPayload = EventPayload> {
  readonly type: string;
  readonly payload: P;
  readonly createdAt: Date;
  readonly userId?: EntityId;
  readonly chatId?: EntityId;
  readonly priority: EventPriority;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface EventOptions {
  userId?: EntityId;
  chatId?: EntityId;
  priority?: EventPriority;
  metadata?: Record<string, unknown>;
  createdAt?: Date;
}

/** Build a frozen event. Throws InvalidEventError for a blank type. */
export function createEvent<P extends EventPayload, T extends string = string>(
  type: T,
  payload: P,
  opts: EventOptions = {},
): BusEvent<P> & { readonly type: T } {
  if (type.trim() === '') {
    throw new InvalidEventError('Event type must be a non-empty string');
  }

  const event: BusEvent<P> & { readonly type: T } = {
    type,
    payload,
    createdAt: opts.createdAt ?? new Date(),
    priority: opts.priority ?? EventPriority.NORMAL,
    metadata: Object.freeze({ ...opts.metadata }),
    ...(opts.userId !== undefined && { userId: opts.userId }),
    ...(opts.chatId !== undefined && { chatId: opts.chatId }),
  };
  return Object.freeze(event);
}

// --- Handler contract ---

export interface EventHandler {
  /** Shown in logs and outcomes; falls back to the constructor name. */
  readonly name?: string;
  readonly eventTypes: readonly string[];
  /** Sort key among handlers of the same type. Defaults to NORMAL. */
  readonly priority?: EventPriority;
  handle(event: BusEvent): unknown;
  /** Receives this handler's own failures. The bus logs them when absent. */
  onError?(event: BusEvent, error: Error): void | Promise<void>;
}

export type HandlerOutcome =
  | { status: 'fulfilled'; handler: string; value: unknown }
  | { status: 'rejected'; handler: string; error: Error };

/** Returning null cancels the publish. */
export type Middleware = (event: BusEvent) => BusEvent | null | Promise<BusEvent | null>;

export function handlerName(handler: EventHandler): string {
  return handler.name ?? handler.constructor.name;
}
