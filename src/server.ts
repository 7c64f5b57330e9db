/**
 * Server Entry Point — Index Load & Graceful Shutdown
 * Layer: Entry Point (top of the dependency tree)
 *
 * Starts one HTTP process. The match index lives in this process's memory
 * and an ingest request replaces it in place, so the server is not forked
 * into a cluster: every worker would hold a different index.
 *
 * Startup:
 *   1. Load the last persisted name index, if any (lookups answer 503 until
 *      an index exists).
 *   2. Listen.
 *
 * Graceful shutdown on SIGTERM/SIGINT: stop accepting connections, let
 * in-flight requests finish, exit 0.
 */
import { MatchService } from '@application/services/MatchService';
import { config } from '@core/config';
import { container } from '@core/container';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { createApp } from '@interfaces/http/app';

async function main(): Promise<void> {
  const matchService = container.resolve<MatchService>(TOKENS.MatchService);
  await matchService.load();

  const app = createApp();
  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Listening on :${config.port}`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err) => {
  logger.fatal({ err }, 'Server failed to start');
  process.exit(1);
});
