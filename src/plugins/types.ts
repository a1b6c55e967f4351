/**
 * Plugin System Types & Metadata Schema
 */

import { z } from 'zod';

import type { EventBus } from '../events/bus.js';
import type { EventHandler } from '../events/types.js';
import type { Logger } from '../logger.js';

// --- Plugin metadata ---

export const PluginMetadataSchema = z.object({
  name: z.string().trim().min(1),
  version: z.string().min(1),
  description: z.string().default(''),
  author: z.string().default(''),
  dependencies: z.array(z.string().min(1)).default([]),
  enabled: z.boolean().default(true),
});

export type PluginMetadata = z.infer<typeof PluginMetadataSchema>;

/** What plugin authors write; defaults are filled in by definePluginMetadata(). */
export type PluginMetadataInput = z.input<typeof PluginMetadataSchema>;

export function definePluginMetadata(input: PluginMetadataInput): PluginMetadata {
  return PluginMetadataSchema.parse(input);
}

// --- Lifecycle ---

export type PluginState = 'unloaded' | 'loading' | 'initialized' | 'unloading';

// --- Plugin context ---

/** Read-only view of the manager handed to plugins that talk to each other. */
export interface PluginLookup {
  getPlugin(name: string): Plugin | undefined;
}

export interface PluginContext {
  bus: EventBus;
  logger: Logger;
  config: Record<string, unknown>;
  plugins: PluginLookup;
}

// --- Plugin interface ---

export interface Plugin {
  readonly metadata: PluginMetadata;
  readonly state: PluginState;
  readonly isInitialized: boolean;
  /** Handlers this plugin has registered on the bus. */
  readonly eventHandlers: readonly EventHandler[];

  /** Driven by the PluginManager; plugins never call it themselves. */
  setState(state: PluginState): void;

  onLoad(ctx: PluginContext): Promise<void>;
  onUnload(): Promise<void>;
  onError(error: Error): void | Promise<void>;
}

// --- Plugin module export shape ---

export type PluginFactory = () => Plugin | Plugin[] | Promise<Plugin | Plugin[]>;

export interface PluginModule {
  register?: PluginFactory;
  default?: PluginFactory;
}

export interface LoadSummary {
  loaded: string[];
  failed: string[];
  skipped: string[];
}
