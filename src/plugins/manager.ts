/**
 * Plugin Manager
 * Loads, unloads and reloads plugins, gating each step on the dependency graph.
 */

import { PLUGIN_LOAD_TIMEOUT_MS, PLUGIN_UNLOAD_TIMEOUT_MS } from '../config.js';
import { LifecycleTimeoutError, toError, withTimeout } from '../errors.js';
import type { EventBus } from '../events/bus.js';
import { pluginLoaded, pluginUnloaded } from '../events/catalog.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { createPluginContext } from './context.js';
import { discoverPlugins } from './loader.js';
import {
  PluginMetadataSchema,
  type LoadSummary,
  type Plugin,
  type PluginLookup,
  type PluginMetadata,
} from './types.js';

export interface PluginManagerOptions {
  bus: EventBus;
  logger?: Logger;
  /** Per-plugin configuration, keyed by plugin name. */
  pluginConfig?: Record<string, Record<string, unknown>>;
  loadTimeoutMs?: number;
  unloadTimeoutMs?: number;
}

export class PluginManager implements PluginLookup {
  private plugins = new Map<string, Plugin>();
  private dependencies = new Map<string, string[]>();
  /** Plugins inside onLoad(), with the dependencies they declared. */
  private loading = new Map<string, string[]>();

  private readonly bus: EventBus;
  private readonly baseLogger: Logger;
  private readonly log: Logger;
  private readonly pluginConfig: Record<string, Record<string, unknown>>;
  private readonly loadTimeoutMs: number;
  private readonly unloadTimeoutMs: number;

  constructor(options: PluginManagerOptions) {
    this.bus = options.bus;
    this.baseLogger = options.logger ?? rootLogger;
    this.log = this.baseLogger.child({ module: 'plugin-manager' });
    this.pluginConfig = options.pluginConfig ?? {};
    this.loadTimeoutMs = options.loadTimeoutMs ?? PLUGIN_LOAD_TIMEOUT_MS;
    this.unloadTimeoutMs = options.unloadTimeoutMs ?? PLUGIN_UNLOAD_TIMEOUT_MS;
  }

  /**
   * Load a plugin once all of its dependencies are loaded and initialized.
   * Resolves false, leaving nothing registered, when the plugin is refused or
   * its onLoad() fails.
   */
  async loadPlugin(plugin: Plugin): Promise<boolean> {
    const parsed = PluginMetadataSchema.safeParse(plugin.metadata);
    if (!parsed.success) {
      this.log.error({ issues: parsed.error.issues }, 'Invalid plugin metadata');
      return false;
    }

    const metadata = parsed.data;
    const name = metadata.name;

    if (this.plugins.has(name) || this.loading.has(name)) {
      this.log.warn({ plugin: name }, 'Plugin already loaded, skipping');
      return false;
    }

    const missing = this.unmetDependencies(metadata);
    if (missing.length > 0) {
      this.log.error(
        { plugin: name, dependencies: metadata.dependencies, missing },
        'Plugin dependencies not met',
      );
      return false;
    }

    const ctx = createPluginContext(
      metadata,
      { bus: this.bus, logger: this.baseLogger, plugins: this },
      this.pluginConfig[name],
    );

    this.loading.set(name, [...metadata.dependencies]);
    plugin.setState('loading');
    let loadWork: Promise<void> | undefined;
    try {
      loadWork = plugin.onLoad(ctx);
      await withTimeout(
        loadWork,
        this.loadTimeoutMs,
        () => new LifecycleTimeoutError(name, 'onLoad', this.loadTimeoutMs),
      );
    } catch (err) {
      const error = toError(err);
      // Roll back whatever the plugin managed to register before failing
      for (const handler of plugin.eventHandlers) {
        this.bus.unregisterHandler(handler);
      }
      plugin.setState('unloaded');
      if (loadWork) this.releaseAbandonedLoad(plugin, loadWork);
      this.log.error({ plugin: name, err: error }, 'Failed to load plugin');
      await this.reportError(plugin, error);
      return false;
    } finally {
      this.loading.delete(name);
    }

    plugin.setState('initialized');
    this.plugins.set(name, plugin);
    this.dependencies.set(name, [...metadata.dependencies]);

    this.log.info(
      { plugin: name, version: metadata.version, author: metadata.author },
      'Plugin loaded',
    );
    this.bus.publish(pluginLoaded({ name, version: metadata.version }));
    return true;
  }

  /**
   * Unload a plugin nothing else depends on. On an onUnload() failure the
   * plugin stays registered; handlers it already released stay released.
   */
  async unloadPlugin(name: string): Promise<boolean> {
    const plugin = this.plugins.get(name);
    if (!plugin) {
      this.log.warn({ plugin: name }, 'Plugin not found');
      return false;
    }
    if (!plugin.isInitialized) {
      this.log.warn({ plugin: name, state: plugin.state }, 'Plugin is not in a state to unload');
      return false;
    }

    const dependents = this.getDependentPlugins(name);
    if (dependents.length > 0) {
      this.log.error(
        { plugin: name, dependents },
        'Cannot unload plugin: other plugins depend on it',
      );
      return false;
    }

    plugin.setState('unloading');
    try {
      await withTimeout(
        plugin.onUnload(),
        this.unloadTimeoutMs,
        () => new LifecycleTimeoutError(name, 'onUnload', this.unloadTimeoutMs),
      );
    } catch (err) {
      const error = toError(err);
      plugin.setState('initialized');
      this.log.error({ plugin: name, err: error }, 'Failed to unload plugin');
      await this.reportError(plugin, error);
      return false;
    }

    this.plugins.delete(name);
    this.dependencies.delete(name);
    plugin.setState('unloaded');

    this.log.info({ plugin: name }, 'Plugin unloaded');
    this.bus.publish(pluginUnloaded({ name }));
    return true;
  }

  /** Unload then load the same instance. */
  async reloadPlugin(name: string): Promise<boolean> {
    const plugin = this.plugins.get(name);
    if (!plugin) return false;

    if (!(await this.unloadPlugin(name))) return false;
    return this.loadPlugin(plugin);
  }

  /**
   * Load a batch in dependency order. Disabled plugins are skipped.
   */
  async loadAll(plugins: Plugin[]): Promise<LoadSummary> {
    const summary: LoadSummary = { loaded: [], failed: [], skipped: [] };
    const enabled: Plugin[] = [];
    for (const plugin of plugins) {
      if (plugin.metadata.enabled === false) {
        this.log.info({ plugin: plugin.metadata.name }, 'Plugin disabled, skipping');
        summary.skipped.push(plugin.metadata.name);
      } else {
        enabled.push(plugin);
      }
    }

    let ordered = enabled;
    try {
      ordered = topologicalSort(enabled);
    } catch (err) {
      // Plugins on a cycle can never pass the dependency gate; let them fail there
      this.log.error({ err: toError(err) }, 'Plugin dependency cycle');
    }

    for (const plugin of ordered) {
      const ok = await this.loadPlugin(plugin);
      (ok ? summary.loaded : summary.failed).push(plugin.metadata.name);
    }
    return summary;
  }

  /** Unload every plugin in reverse load order. */
  async unloadAll(): Promise<void> {
    for (const name of [...this.plugins.keys()].reverse()) {
      await this.unloadPlugin(name);
    }
  }

  /**
   * Import plugin modules from a directory and load what they register.
   * Modules that fail to import are logged and counted as failed.
   */
  async loadPluginsFromDirectory(dir: string): Promise<LoadSummary> {
    const discovery = await discoverPlugins(dir, this.log);
    if (discovery.plugins.length === 0 && discovery.errors.length === 0) {
      this.log.warn({ dir }, 'No plugin modules found');
    }

    const summary = await this.loadAll(discovery.plugins.map((d) => d.plugin));
    summary.failed.push(...discovery.errors.map((e) => e.source));
    return summary;
  }

  getPlugin(name: string): Plugin | undefined {
    return this.plugins.get(name);
  }

  /** All loaded plugins in load order. */
  getAllPlugins(): Plugin[] {
    return [...this.plugins.values()];
  }

  getPluginInfo(name: string): PluginMetadata | undefined {
    return this.plugins.get(name)?.metadata;
  }

  get loadedPluginsCount(): number {
    return this.plugins.size;
  }

  /** Loaded or loading plugins that declare `name` as a dependency. */
  getDependentPlugins(name: string): string[] {
    const dependents: string[] = [];
    for (const graph of [this.dependencies, this.loading]) {
      for (const [plugin, deps] of graph) {
        if (deps.includes(name)) dependents.push(plugin);
      }
    }
    return dependents;
  }

  private unmetDependencies(metadata: PluginMetadata): string[] {
    return metadata.dependencies.filter((dep) => !this.plugins.get(dep)?.isInitialized);
  }

  /**
   * A timed-out onLoad() keeps running. Once it settles, drop any handlers it
   * registered late, unless the plugin has been loaded again meanwhile.
   */
  private releaseAbandonedLoad(plugin: Plugin, loadWork: Promise<void>): void {
    const release = () => {
      if (plugin.state !== 'unloaded' || this.plugins.get(plugin.metadata.name) === plugin) return;
      for (const handler of plugin.eventHandlers) {
        this.bus.unregisterHandler(handler);
      }
    };
    void loadWork.then(release, release);
  }

  private async reportError(plugin: Plugin, error: Error): Promise<void> {
    try {
      await plugin.onError(error);
    } catch (err) {
      this.log.error({ plugin: plugin.metadata.name, err }, 'Plugin onError callback failed');
    }
  }
}

/** Order plugins so dependencies come first. Throws on cycles. */
export function topologicalSort(plugins: Plugin[]): Plugin[] {
  const byName = new Map(plugins.map((p) => [p.metadata.name, p]));
  const visited = new Set<string>();
  const visiting = new Set<string>();
  const sorted: Plugin[] = [];

  const visit = (name: string) => {
    if (visited.has(name)) return;
    if (visiting.has(name)) {
      throw new Error(`Circular plugin dependency detected involving "${name}"`);
    }

    const plugin = byName.get(name);
    if (!plugin) return; // Already loaded or absent; the gate decides

    visiting.add(name);
    for (const dep of plugin.metadata.dependencies) {
      visit(dep);
    }
    visiting.delete(name);
    visited.add(name);
    sorted.push(plugin);
  };

  for (const plugin of plugins) {
    visit(plugin.metadata.name);
  }

  return sorted;
}
