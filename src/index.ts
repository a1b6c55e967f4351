export * from './events/index.js';
export * from './plugins/index.js';
export { createRuntime, Runtime, type RuntimeOptions, type RuntimeStats } from './runtime.js';
export { loadConfig, type AppConfig } from './config.js';
export { logger, type Logger } from './logger.js';
export {
  HandlerTimeoutError,
  InvalidEventError,
  LifecycleTimeoutError,
  toError,
} from './errors.js';
