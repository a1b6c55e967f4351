/**
 * Event Catalog
 * Typed payloads and factories for the events the host publishes.
 * Payloads stay opaque to the bus; the types exist for publishers and plugins.
 */

import {
  createEvent,
  EventPriority,
  type BusEvent,
  type EntityId,
  type EventOptions,
} from './types.js';

type CatalogOptions = Omit<EventOptions, 'priority'>;

// --- Chat transport ---

export type ChatUser = { id: EntityId; username?: string; fullName?: string };
export type ChatRef = { id: EntityId; type?: string; title?: string };

export type MessageReceivedPayload = {
  messageId: EntityId;
  text: string | null;
  messageType: string;
  from?: ChatUser;
  chat?: ChatRef;
  /** Sends a reply into the originating chat. */
  reply: (text: string) => Promise<void>;
};

export type CallbackQueryPayload = {
  callbackId: string;
  callbackData: string;
  messageId?: EntityId;
  /** Answers the button press; showAlert renders a modal instead of a toast. */
  answer: (text: string, opts?: { showAlert?: boolean }) => Promise<void>;
};

export type ChatMemberUpdatedPayload = {
  action: 'joined' | 'left' | 'promoted' | 'restricted';
  oldStatus: string;
  newStatus: string;
};

// --- Business ---

export type TaskCreatedPayload = {
  taskId: string;
  taskTitle: string;
  createdBy: EntityId;
  assignee?: string;
  project?: string;
};

export type WorkJournalEntryPayload = {
  entryId: EntityId;
  company: string;
  duration: string;
  description: string;
};

// --- AI ---

export type ChatTurn = { role: string; content: string };

export type AiRequestPayload = {
  prompt: string;
  context: ChatTurn[];
  model: string;
};

export type AiResponsePayload = {
  response: string;
  model: string;
  tokensUsed?: number;
  processingTimeMs?: number;
};

export type SummarizedMessage = { id: EntityId; author?: string; text: string; sentAt?: Date };

export type ChatSummaryRequestPayload = {
  messages: SummarizedMessage[];
  messagesCount: number;
  timeRange?: string;
};

export type AutoTaskDetectedPayload = {
  detectedTask: string;
  confidence: number;
  sourceMessageId: EntityId;
  suggestedAssignee?: string;
};

// --- System ---

export type UserAuthenticatedPayload = {
  username?: string;
  role: string;
};

export type SystemErrorPayload = {
  errorType: string;
  errorMessage: string;
  context: string;
};

export type PluginLoadedPayload = { name: string; version: string };
export type PluginUnloadedPayload = { name: string };

export interface EventMap {
  'message.received': MessageReceivedPayload;
  'callback.query': CallbackQueryPayload;
  'chat.member.updated': ChatMemberUpdatedPayload;
  'task.created': TaskCreatedPayload;
  'work_journal.entry.created': WorkJournalEntryPayload;
  'ai.request': AiRequestPayload;
  'ai.response': AiResponsePayload;
  'chat.summary.request': ChatSummaryRequestPayload;
  'ai.auto_task.detected': AutoTaskDetectedPayload;
  'user.authenticated': UserAuthenticatedPayload;
  'system.error': SystemErrorPayload;
  'plugin.loaded': PluginLoadedPayload;
  'plugin.unloaded': PluginUnloadedPayload;
}

export type CatalogEventType = keyof EventMap;

export type CatalogEvent<K extends CatalogEventType> = BusEvent<EventMap[K]> & { readonly type: K };

/** Narrow a generic event by its type string. The payload shape is trusted. */
export function isEventType<K extends CatalogEventType>(
  event: BusEvent,
  type: K,
): event is CatalogEvent<K> {
  return event.type === type;
}

function catalogEvent<K extends CatalogEventType>(
  type: K,
  payload: EventMap[K],
  priority: EventPriority,
  opts: CatalogOptions,
): CatalogEvent<K> {
  return createEvent(type, payload, { ...opts, priority });
}

export function messageReceived(
  payload: Omit<MessageReceivedPayload, 'messageType'> & { messageType?: string },
  opts: CatalogOptions = {},
): CatalogEvent<'message.received'> {
  return catalogEvent(
    'message.received',
    { ...payload, messageType: payload.messageType ?? 'text' },
    EventPriority.NORMAL,
    opts,
  );
}

export function callbackQuery(
  payload: CallbackQueryPayload,
  opts: CatalogOptions = {},
): CatalogEvent<'callback.query'> {
  return catalogEvent('callback.query', payload, EventPriority.NORMAL, opts);
}

export function chatMemberUpdated(
  payload: ChatMemberUpdatedPayload,
  opts: CatalogOptions = {},
): CatalogEvent<'chat.member.updated'> {
  return catalogEvent('chat.member.updated', payload, EventPriority.NORMAL, opts);
}

export function taskCreated(
  payload: TaskCreatedPayload,
  opts: CatalogOptions = {},
): CatalogEvent<'task.created'> {
  return catalogEvent('task.created', payload, EventPriority.HIGH, {
    userId: payload.createdBy,
    ...opts,
  });
}

export function workJournalEntryCreated(
  payload: WorkJournalEntryPayload,
  opts: CatalogOptions = {},
): CatalogEvent<'work_journal.entry.created'> {
  return catalogEvent('work_journal.entry.created', payload, EventPriority.NORMAL, opts);
}

export function aiRequest(
  payload: { prompt: string; context?: ChatTurn[]; model?: string },
  opts: CatalogOptions = {},
): CatalogEvent<'ai.request'> {
  return catalogEvent(
    'ai.request',
    { prompt: payload.prompt, context: payload.context ?? [], model: payload.model ?? 'gpt-4' },
    EventPriority.HIGH,
    opts,
  );
}

export function aiResponse(
  payload: AiResponsePayload,
  opts: CatalogOptions = {},
): CatalogEvent<'ai.response'> {
  return catalogEvent('ai.response', payload, EventPriority.HIGH, opts);
}

export function chatSummaryRequest(
  payload: { messages: SummarizedMessage[]; timeRange?: string },
  opts: CatalogOptions = {},
): CatalogEvent<'chat.summary.request'> {
  return catalogEvent(
    'chat.summary.request',
    { ...payload, messagesCount: payload.messages.length },
    EventPriority.HIGH,
    opts,
  );
}

export function autoTaskDetected(
  payload: AutoTaskDetectedPayload,
  opts: CatalogOptions = {},
): CatalogEvent<'ai.auto_task.detected'> {
  return catalogEvent('ai.auto_task.detected', payload, EventPriority.HIGH, opts);
}

export function userAuthenticated(
  payload: { username?: string; role?: string },
  opts: CatalogOptions = {},
): CatalogEvent<'user.authenticated'> {
  return catalogEvent(
    'user.authenticated',
    { ...payload, role: payload.role ?? 'user' },
    EventPriority.NORMAL,
    opts,
  );
}

export function systemError(
  error: Error,
  context: string,
  opts: CatalogOptions = {},
): CatalogEvent<'system.error'> {
  return catalogEvent(
    'system.error',
    { errorType: error.name, errorMessage: error.message, context },
    EventPriority.CRITICAL,
    opts,
  );
}

export function pluginLoaded(payload: PluginLoadedPayload): CatalogEvent<'plugin.loaded'> {
  return catalogEvent('plugin.loaded', payload, EventPriority.LOW, {});
}

export function pluginUnloaded(payload: PluginUnloadedPayload): CatalogEvent<'plugin.unloaded'> {
  return catalogEvent('plugin.unloaded', payload, EventPriority.LOW, {});
}
