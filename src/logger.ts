import pino from 'pino';

import { LOG_LEVEL } from './config.js';

export type { Logger } from 'pino';

export const logger = pino({
  level: LOG_LEVEL,
  base: { service: 'hookwire' },
});
