/**
 * Plugin System — re-exports
 */

export { PluginManager, topologicalSort, type PluginManagerOptions } from './manager.js';
export { BasePlugin } from './plugin.js';
export {
  AIPlugin,
  AIPluginHandler,
  CallbackPlugin,
  CallbackPluginHandler,
  MessagePlugin,
  MessagePluginHandler,
} from './adapters.js';
export { createPluginContext, type ContextServices } from './context.js';
export { discoverPlugins, isPlugin, listPluginModules, type DiscoveryResult } from './loader.js';
export type {
  LoadSummary,
  Plugin,
  PluginContext,
  PluginFactory,
  PluginLookup,
  PluginMetadata,
  PluginMetadataInput,
  PluginModule,
  PluginState,
} from './types.js';
export { definePluginMetadata, PluginMetadataSchema } from './types.js';
