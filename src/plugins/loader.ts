/**
 * Plugin Discovery
 * Imports plugin modules from a directory. Every module exposes a single
 * entry point, `register` (or a default function), that returns its plugins.
 */

import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';

import { toError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Plugin, PluginFactory, PluginModule } from './types.js';

const MODULE_EXTENSIONS = ['.js', '.mjs'];
const INDEX_FILES = ['index.js', 'index.mjs'];

export interface DiscoveredPlugin {
  plugin: Plugin;
  /** File the plugin came from. */
  source: string;
}

export interface DiscoveryResult {
  plugins: DiscoveredPlugin[];
  errors: Array<{ source: string; error: Error }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

/** Structural check for values coming out of dynamically imported modules. */
export function isPlugin(value: unknown): value is Plugin {
  if (!isRecord(value) || !isRecord(value.metadata)) return false;
  const meta = value.metadata;
  return (
    typeof meta.name === 'string' &&
    typeof meta.version === 'string' &&
    typeof value.state === 'string' &&
    typeof value.setState === 'function' &&
    typeof value.onLoad === 'function' &&
    typeof value.onUnload === 'function' &&
    typeof value.onError === 'function' &&
    Array.isArray(value.eventHandlers)
  );
}

/** Module entry files in a directory, sorted by name. */
export function listPluginModules(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];

  const files: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (entry.name.startsWith('_') || entry.name.startsWith('.')) continue;
    const full = path.join(dir, entry.name);

    if (entry.isFile() && MODULE_EXTENSIONS.includes(path.extname(entry.name))) {
      files.push(full);
    } else if (entry.isDirectory()) {
      const index = INDEX_FILES.map((f) => path.join(full, f)).find((f) => fs.existsSync(f));
      if (index) files.push(index);
    }
  }

  return files.sort();
}

function entryPoint(mod: PluginModule): PluginFactory | undefined {
  if (typeof mod.register === 'function') return mod.register;
  if (typeof mod.default === 'function') return mod.default;
  return undefined;
}

/**
 * Import every plugin module in `dir` and collect the plugins their entry
 * points return. A broken module is recorded in `errors` and skipped.
 */
export async function discoverPlugins(dir: string, log: Logger): Promise<DiscoveryResult> {
  const result: DiscoveryResult = { plugins: [], errors: [] };

  for (const file of listPluginModules(dir)) {
    const source = path.relative(dir, file);
    try {
      const mod = (await import(pathToFileURL(file).href)) as PluginModule;
      const factory = entryPoint(mod);
      if (!factory) {
        throw new Error('module exports neither register() nor a default factory');
      }

      const produced = await factory();
      const candidates: unknown[] = Array.isArray(produced) ? produced : [produced];
      const plugins = candidates.filter(isPlugin);
      if (plugins.length !== candidates.length) {
        throw new Error('entry point returned a value that is not a plugin');
      }
      result.plugins.push(...plugins.map((plugin) => ({ plugin, source })));
    } catch (err) {
      const error = toError(err);
      log.error({ source, err: error }, 'Failed to import plugin module');
      result.errors.push({ source, error });
    }
  }

  return result;
}
