/**
 * Ingest CLI Script — Standalone Batch Run
 * Layer: Entry Point (CLI, not HTTP)
 *
 * The main way to load a registry extract:
 *   npm run ingest [-- --file path] [--format fixed|csv]
 * Checks the file exists, runs the same IngestionService the HTTP endpoint
 * uses, then prints counts, rejections and throughput. Exits 1 when the run
 * fails (the status document already says why).
 */
import { IngestionService } from '@application/services/IngestionService';
import { config } from '@core/config';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import fs from 'fs';
import path from 'path';

// CLI argument parsing

const args = process.argv.slice(2);

function getArg(flag: string, fallback: string): string {
  const idx = args.indexOf(flag);
  return idx !== -1 && args[idx + 1] ? args[idx + 1] : fallback;
}

const defaultFile = path.resolve(config.registry.dataDir, config.registry.inputFile);
const filePath = path.resolve(getArg('--file', defaultFile));
const format = getArg('--format', 'fixed') === 'csv' ? 'csv' : 'fixed';

/** Rejections listed in full before the summary; the rest are counted. */
const MAX_LISTED_REJECTIONS = 20;

// Helpers

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = (ms / 1000).toFixed(1);
  if (ms < 60_000) return `${seconds}s`;
  const minutes = Math.floor(ms / 60_000);
  const remainingSec = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${remainingSec}s`;
}

function formatNumber(n: number): string {
  return n.toLocaleString();
}

// Main

async function main(): Promise<void> {
  // eslint-disable-next-line no-console
  const log = console.log;

  log('');
  log('  Registry ingest');
  log('');

  if (!fs.existsSync(filePath)) {
    log(`  ERROR: File not found: ${filePath}`);
    log('  Use --file <path> to specify the batch file.');
    process.exit(1);
  }

  const fileSize = fs.statSync(filePath).size;
  log(`  File:         ${filePath}`);
  log(`  Size:         ${(fileSize / 1024 / 1024).toFixed(1)} MB`);
  log(`  Format:       ${format}`);
  log(`  Record width: ${config.registry.recordWidth}`);
  log(`  Chunk size:   ${formatNumber(config.registry.chunkSize)}`);
  log(`  Output:       ${path.resolve(config.registry.outputDir)}`);
  log('');

  const service = container.resolve<IngestionService>(TOKENS.IngestionService);
  const result = await service.ingest(filePath, format);

  for (const rejection of result.rejections.slice(0, MAX_LISTED_REJECTIONS)) {
    log(`  line ${rejection.lineNumber}: ${rejection.reason}`);
  }
  if (result.rejections.length > MAX_LISTED_REJECTIONS) {
    log(`  … and ${formatNumber(result.rejections.length - MAX_LISTED_REJECTIONS)} more rejections`);
  }

  const avgRps = result.durationMs > 0 ? Math.round((result.totalProcessed / result.durationMs) * 1000) : 0;

  log('');
  log('  ✓ Ingestion complete');
  log(`    Records:        ${formatNumber(result.totalProcessed)}`);
  log(`    Accepted:       ${formatNumber(result.totalAccepted)}`);
  log(`    Rejected:       ${formatNumber(result.totalRejected)}`);
  log(`    Segments:       ${formatNumber(result.segmentsWritten)}`);
  log(`    Index entries:  ${formatNumber(result.indexSize)}`);
  log(`    Duration:       ${formatDuration(result.durationMs)}`);
  log(`    Avg throughput: ${formatNumber(avgRps)} rec/s`);
  log('');
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Ingest failed:', err);
  process.exit(1);
});
