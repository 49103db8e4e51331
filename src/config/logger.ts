/**
 * Winston Logger Configuration
 *
 * Structured JSON logging with the service name on every line.
 * Silent under test so vitest output stays readable.
 */

import winston from 'winston';
import { config } from './index';

export const logger = winston.createLogger({
  level: config.nodeEnv === 'production' ? 'info' : 'debug',
  silent: config.nodeEnv === 'test',
  defaultMeta: {
    service: config.service.name,
    version: config.service.version,
  },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [new winston.transports.Console()],
});
