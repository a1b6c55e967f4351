/**
 * Plugin Adapters
 * Base plugins for common reactions. Each registers one adapter handler per
 * instance that narrows the event, checks the plugin's predicate, calls the
 * typed callback and turns its return value into a side effect.
 */

import {
  isEventType,
  type CatalogEvent,
  type CatalogEventType,
} from '../events/catalog.js';
import { EventPriority, type BusEvent, type EventHandler } from '../events/types.js';
import { BasePlugin } from './plugin.js';
import type { PluginContext } from './types.js';

type MessageEvent = CatalogEvent<'message.received'>;
type CallbackEvent = CatalogEvent<'callback.query'>;
type AiResponseEvent = CatalogEvent<'ai.response'>;

/** Shared shape of the adapter handlers: fixed type, owner-defined priority. */
abstract class PluginHandler<P extends BasePlugin> implements EventHandler {
  abstract readonly eventTypes: readonly CatalogEventType[];

  constructor(protected readonly plugin: P, readonly priority: EventPriority) {}

  get name(): string {
    return `${this.plugin.metadata.name}:${this.constructor.name}`;
  }

  abstract handle(event: BusEvent): Promise<unknown>;

  onError(_event: BusEvent, error: Error): Promise<void> | void {
    return this.plugin.onError(error);
  }
}

// --- Messages ---

export abstract class MessagePlugin extends BasePlugin {
  /** Sort key of this plugin's message handler. */
  protected readonly handlerPriority: EventPriority = EventPriority.NORMAL;

  async onLoad(ctx: PluginContext): Promise<void> {
    await super.onLoad(ctx);
    this.registerEventHandler(new MessagePluginHandler(this, this.handlerPriority));
  }

  /** Return text to reply with, or null to stay silent. */
  abstract processMessage(text: string, event: MessageEvent): Promise<string | null>;

  async shouldProcess(_event: MessageEvent): Promise<boolean> {
    return true;
  }
}

export class MessagePluginHandler extends PluginHandler<MessagePlugin> {
  readonly eventTypes = ['message.received'] as const;

  async handle(event: BusEvent): Promise<string | undefined> {
    if (!isEventType(event, 'message.received')) return undefined;

    const text = event.payload.text;
    if (!text) return undefined;
    if (!(await this.plugin.shouldProcess(event))) return undefined;

    const reply = await this.plugin.processMessage(text, event);
    if (!reply) return undefined;

    await event.payload.reply(reply);
    return reply;
  }
}

// --- Callback queries ---

export abstract class CallbackPlugin extends BasePlugin {
  protected readonly handlerPriority: EventPriority = EventPriority.NORMAL;

  async onLoad(ctx: PluginContext): Promise<void> {
    await super.onLoad(ctx);
    this.registerEventHandler(new CallbackPluginHandler(this, this.handlerPriority));
  }

  /** Return text to show as an alert, or null to answer nothing. */
  abstract processCallback(data: string, event: CallbackEvent): Promise<string | null>;

  async shouldProcess(_event: CallbackEvent): Promise<boolean> {
    return true;
  }
}

export class CallbackPluginHandler extends PluginHandler<CallbackPlugin> {
  readonly eventTypes = ['callback.query'] as const;

  async handle(event: BusEvent): Promise<string | undefined> {
    if (!isEventType(event, 'callback.query')) return undefined;

    const data = event.payload.callbackData;
    if (!data) return undefined;
    if (!(await this.plugin.shouldProcess(event))) return undefined;

    const answer = await this.plugin.processCallback(data, event);
    if (!answer) return undefined;

    await event.payload.answer(answer, { showAlert: true });
    return answer;
  }
}

// --- AI responses ---

export abstract class AIPlugin extends BasePlugin {
  protected readonly handlerPriority: EventPriority = EventPriority.NORMAL;

  async onLoad(ctx: PluginContext): Promise<void> {
    await super.onLoad(ctx);
    this.registerEventHandler(new AIPluginHandler(this, this.handlerPriority));
  }

  /** Extra data derived from the response; becomes the handler's result. */
  abstract processAiResponse(
    response: string,
    event: AiResponseEvent,
  ): Promise<Record<string, unknown> | null>;
}

export class AIPluginHandler extends PluginHandler<AIPlugin> {
  readonly eventTypes = ['ai.response'] as const;

  async handle(event: BusEvent): Promise<Record<string, unknown> | null | undefined> {
    if (!isEventType(event, 'ai.response')) return undefined;

    const response = event.payload.response;
    if (!response) return undefined;

    return this.plugin.processAiResponse(response, event);
  }
}
