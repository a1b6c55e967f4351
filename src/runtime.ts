/**
 * Runtime
 * One event bus and one plugin manager, built together and handed to the
 * host's bootstrap instead of living in module-level singletons.
 */

import { defaultConfig, type AppConfig } from './config.js';
import { EventBus } from './events/bus.js';
import { logger as rootLogger, type Logger } from './logger.js';
import { PluginManager } from './plugins/manager.js';
import type { LoadSummary, Plugin, PluginFactory } from './plugins/types.js';

export interface RuntimeOptions {
  config?: AppConfig;
  logger?: Logger;
  /** Plugins assembled at startup, loaded before the plugin directory. */
  plugins?: PluginFactory[];
  pluginConfig?: Record<string, Record<string, unknown>>;
}

export interface RuntimeStats {
  eventTypes: number;
  plugins: number;
  historySize: number;
  backgroundTasks: number;
}

/** How long shutdown() waits for fire-and-forget publishes. */
const SHUTDOWN_DRAIN_MS = 5000;

export class Runtime {
  readonly bus: EventBus;
  readonly plugins: PluginManager;

  private readonly config: AppConfig;
  private readonly factories: PluginFactory[];
  private readonly log: Logger;
  private started = false;

  constructor(options: RuntimeOptions = {}) {
    const base = options.logger ?? rootLogger;
    this.config = options.config ?? defaultConfig;
    this.factories = options.plugins ?? [];
    this.log = base.child({ module: 'runtime' });

    this.bus = new EventBus({
      maxHistory: this.config.eventHistorySize,
      historyTtlMs: this.config.eventHistoryTtlMs,
      handlerTimeoutMs: this.config.handlerTimeoutMs,
      logger: base,
    });
    this.plugins = new PluginManager({
      bus: this.bus,
      logger: base,
      pluginConfig: options.pluginConfig,
      loadTimeoutMs: this.config.pluginLoadTimeoutMs,
      unloadTimeoutMs: this.config.pluginUnloadTimeoutMs,
    });
  }

  /** Start history cleanup and load the configured plugins. */
  async start(): Promise<LoadSummary> {
    const summary: LoadSummary = { loaded: [], failed: [], skipped: [] };
    if (this.started) {
      this.log.warn('Runtime already started');
      return summary;
    }
    this.started = true;

    if (this.config.eventHistoryTtlMs > 0) {
      this.bus.startCleanupLoop(this.config.eventCleanupIntervalMs);
    }

    const assembled: Plugin[] = [];
    for (const factory of this.factories) {
      try {
        const produced = await factory();
        assembled.push(...(Array.isArray(produced) ? produced : [produced]));
      } catch (err) {
        this.log.error({ err }, 'Plugin factory failed');
        summary.failed.push(factory.name || 'anonymous');
      }
    }
    merge(summary, await this.plugins.loadAll(assembled));

    if (this.config.pluginsDir) {
      merge(summary, await this.plugins.loadPluginsFromDirectory(this.config.pluginsDir));
    }

    this.log.info(
      { loaded: summary.loaded.length, failed: summary.failed.length, skipped: summary.skipped.length },
      'Runtime started',
    );
    return summary;
  }

  /** Unload plugins, drain background publishes, stop history cleanup. */
  async shutdown(): Promise<void> {
    await this.plugins.unloadAll();
    await this.bus.waitForBackgroundTasks(SHUTDOWN_DRAIN_MS);
    this.bus.stopCleanupLoop();
    this.started = false;
    this.log.info('Runtime stopped');
  }

  stats(): RuntimeStats {
    return {
      eventTypes: this.bus.registeredEventTypes.length,
      plugins: this.plugins.loadedPluginsCount,
      historySize: this.bus.historySize,
      backgroundTasks: this.bus.backgroundTaskCount,
    };
  }
}

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  return new Runtime(options);
}

function merge(into: LoadSummary, from: LoadSummary): void {
  into.loaded.push(...from.loaded);
  into.failed.push(...from.failed);
  into.skipped.push(...from.skipped);
}
