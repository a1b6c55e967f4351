import path from 'path';
import { z } from 'zod';

const LogLevel = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

const milliseconds = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const ConfigSchema = z.object({
  LOG_LEVEL: LogLevel.default('info'),
  EVENT_HISTORY_SIZE: z.coerce.number().int().positive().default(1000),
  EVENT_HISTORY_TTL_MS: milliseconds(60 * 60 * 1000),
  EVENT_CLEANUP_INTERVAL_MS: milliseconds(30 * 60 * 1000),
  HANDLER_TIMEOUT_MS: milliseconds(30_000),
  PLUGIN_LOAD_TIMEOUT_MS: milliseconds(30_000),
  PLUGIN_UNLOAD_TIMEOUT_MS: milliseconds(10_000),
  PLUGINS_DIR: z.string().trim().min(1).optional(),
});

export interface AppConfig {
  logLevel: z.infer<typeof LogLevel>;
  eventHistorySize: number;
  /** 0 disables age-based pruning of the event history. */
  eventHistoryTtlMs: number;
  eventCleanupIntervalMs: number;
  /** 0 disables the per-handler timeout. */
  handlerTimeoutMs: number;
  pluginLoadTimeoutMs: number;
  pluginUnloadTimeoutMs: number;
  /** Absolute path scanned for plugin modules at startup, if set. */
  pluginsDir?: string;
}

/**
 * Read configuration from environment variables.
 * Empty strings count as unset so `FOO=` falls back to the default.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const raw = Object.fromEntries(
    Object.keys(ConfigSchema.shape).map((key) => [key, env[key] === '' ? undefined : env[key]]),
  );
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    logLevel: values.LOG_LEVEL,
    eventHistorySize: values.EVENT_HISTORY_SIZE,
    eventHistoryTtlMs: values.EVENT_HISTORY_TTL_MS,
    eventCleanupIntervalMs: values.EVENT_CLEANUP_INTERVAL_MS,
    handlerTimeoutMs: values.HANDLER_TIMEOUT_MS,
    pluginLoadTimeoutMs: values.PLUGIN_LOAD_TIMEOUT_MS,
    pluginUnloadTimeoutMs: values.PLUGIN_UNLOAD_TIMEOUT_MS,
    pluginsDir: values.PLUGINS_DIR ? path.resolve(values.PLUGINS_DIR) : undefined,
  };
}

const config = loadConfig();

export const LOG_LEVEL = config.logLevel;
export const EVENT_HISTORY_SIZE = config.eventHistorySize;
export const EVENT_HISTORY_TTL_MS = config.eventHistoryTtlMs;
export const EVENT_CLEANUP_INTERVAL_MS = config.eventCleanupIntervalMs;
export const HANDLER_TIMEOUT_MS = config.handlerTimeoutMs;
export const PLUGIN_LOAD_TIMEOUT_MS = config.pluginLoadTimeoutMs;
export const PLUGIN_UNLOAD_TIMEOUT_MS = config.pluginUnloadTimeoutMs;
export const PLUGINS_DIR = config.pluginsDir;

export const defaultConfig: Readonly<AppConfig> = Object.freeze({ ...config });
