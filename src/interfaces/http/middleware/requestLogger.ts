/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * Pino's HTTP plugin, on the shared logger from core/logger.ts: one line per
 * request with method, URL, status and response time.
 */
import { logger } from '@core/logger';
import pinoHttp from 'pino-http';

export const requestLogger = pinoHttp({ logger });
