import pino, { type Logger } from 'pino';
import { getConfig } from './config.js';

const cfg = getConfig();

export const logger = pino({
  level: cfg.logLevel,
  base: undefined,
  redact: ['req.headers.authorization', 'headers.authorization'],
});

/** Child logger tagged with the pipeline stage that emits the record. */
export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
