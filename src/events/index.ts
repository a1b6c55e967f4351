/**
 * Event Bus — re-exports
 */

export { EventBus, type EventBusOptions } from './bus.js';
export {
  createEvent,
  EventPriority,
  handlerName,
  priorityName,
  type BusEvent,
  type EntityId,
  type EventHandler,
  type EventOptions,
  type EventPayload,
  type EventPriorityName,
  type HandlerOutcome,
  type Middleware,
} from './types.js';
export * from './catalog.js';
