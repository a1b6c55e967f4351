/**
 * Plugin Context & Dependency Injection
 * Builds the per-plugin view of the host services.
 */

import type { EventBus } from '../events/bus.js';
import type { Logger } from '../logger.js';
import type { PluginContext, PluginLookup, PluginMetadata } from './types.js';

export interface ContextServices {
  logger: Logger;
  bus: EventBus;
  plugins: PluginLookup;
}

/**
 * Build a PluginContext whose logger is tagged with the plugin name.
 */
export function createPluginContext(
  metadata: PluginMetadata,
  services: ContextServices,
  config?: Record<string, unknown>,
): PluginContext {
  return {
    bus: services.bus,
    logger: services.logger.child({ plugin: metadata.name }),
    config: config ?? {},
    plugins: services.plugins,
  };
}
