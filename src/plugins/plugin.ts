/**
 * Base Plugin
 * Tracks the handlers a plugin registers so unloading can remove them all.
 */

import type { EventHandler } from '../events/types.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { Plugin, PluginContext, PluginMetadata, PluginState } from './types.js';

export abstract class BasePlugin implements Plugin {
  abstract readonly metadata: PluginMetadata;

  private currentState: PluginState = 'unloaded';
  private handlers: EventHandler[] = [];
  private ctx: PluginContext | null = null;

  get state(): PluginState {
    return this.currentState;
  }

  get isInitialized(): boolean {
    return this.currentState === 'initialized';
  }

  get eventHandlers(): readonly EventHandler[] {
    return this.handlers;
  }

  setState(state: PluginState): void {
    this.currentState = state;
  }

  /** Available from onLoad() until the plugin is unloaded. */
  protected get context(): PluginContext {
    if (!this.ctx) {
      throw new Error(`Plugin "${this.metadata.name}" has no context outside of its lifecycle`);
    }
    return this.ctx;
  }

  protected get logger(): Logger {
    return this.ctx?.logger ?? rootLogger.child({ plugin: this.metadata.name });
  }

  /**
   * Subclasses that override this must call `super.onLoad(ctx)` first.
   */
  async onLoad(ctx: PluginContext): Promise<void> {
    this.ctx = ctx;
    this.handlers = [];
  }

  /**
   * Unregisters every tracked handler. Subclasses that override this should
   * call `super.onUnload()` after releasing their own resources.
   */
  async onUnload(): Promise<void> {
    const bus = this.ctx?.bus;
    for (const handler of this.handlers.splice(0)) {
      bus?.unregisterHandler(handler);
    }
    this.ctx = null;
  }

  onError(error: Error): void | Promise<void> {
    this.logger.error({ err: error }, 'Plugin error');
  }

  /** Track a handler and register it on the bus. Only valid during a load. */
  protected registerEventHandler(handler: EventHandler): void {
    const { bus } = this.context;
    if (this.currentState !== 'loading') {
      throw new Error(
        `Plugin "${this.metadata.name}" can only register handlers while loading (state: ${this.currentState})`,
      );
    }
    bus.registerHandler(handler);
    this.handlers.push(handler);
  }
}
