/**
 * Server Logger
 *
 * Structured JSON logging; pretty output in development. The same
 * instance is handed to Fastify so request logs share its fields.
 */

import { pino } from 'pino';
import type { Logger } from '@meshwatch/utils';
import type { ServerConfig } from '../config/index.js';

export function createServerLogger(config: Pick<ServerConfig, 'logLevel' | 'nodeEnv'>): Logger {
  return pino({
    level: config.nodeEnv === 'test' ? 'silent' : config.logLevel,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'meshwatch-server',
      env: config.nodeEnv,
    },
    transport: config.nodeEnv === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
      },
    } : undefined,
  });
}
