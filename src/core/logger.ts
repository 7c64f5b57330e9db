/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per log line in production; in development the stream is
 * piped through `pino-pretty` for colors and readable timestamps.
 *
 * The exported `Logger` type lets services declare "I need a logger" without
 * coupling to Pino directly, so tests can hand them a stub.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
