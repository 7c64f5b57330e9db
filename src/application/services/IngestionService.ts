/**
 * Ingestion Service — Facade over the Registry Pipeline
 * Layer: Application
 * Pattern: Facade Pattern
 *
 * Calling `ingest(filePath)` hides the whole run:
 *
 *   batch file → readRecordLines → RecordCodec.decodeLine (per line) ─┐
 *   CSV export → readCsvRows → entityFromCsvRow (per row) ─────────────┤
 *                                                                      ↓
 *              accepted entities ─┬→ MatchIndex.build → name index + MatchService
 *                                 └→ Batcher.segments → one file per segment
 *                                    (segments left from a larger earlier run are removed)
 *              → status document
 *
 * Rejections: a line that fails to decode (FormatError) or repeats a document
 * number seen earlier in the batch (ConflictError) is rejected on its own.
 * With `onReject: 'skip'` the run carries on and reports the rejection; with
 * `'halt'` the first rejection fails the run. Empty lines are not records and
 * are passed over. A run that reads records but accepts none of them fails
 * instead of replacing a good index with an empty one.
 *
 * Every run ends with a status document, `success` or `failure`. A failed run
 * rethrows after writing it and leaves the published index untouched.
 */
import fs from 'node:fs/promises';
import path from 'node:path';

import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { Batcher } from '@domain/codec/Batcher';
import { type CsvRow, entityFromCsvRow } from '@domain/codec/csvRowEntity';
import type { RecordCodec } from '@domain/codec/RecordCodec';
import type { Entity } from '@domain/entities/Entity';
import type { IArtifactStore } from '@domain/interfaces/IArtifactStore';
import { MatchIndex } from '@domain/matching/MatchIndex';
import type { NameNormalizer } from '@domain/matching/NameNormalizer';
import { readCsvRows } from '@infrastructure/sources/readCsvRows';
import { readRecordLines } from '@infrastructure/sources/readRecordLines';
import { AppError, ConflictError, NotFoundError } from '@shared/errors/AppError';
import type { IngestionResult, RejectedRecord, RunOutcome } from '@shared/types';
import { inject, injectable } from 'tsyringe';

import { MatchService } from './MatchService';

export interface IngestionOptions {
  onReject: 'skip' | 'halt';
  /** Log a progress line every N input lines. */
  progressInterval: number;
}

export type BatchFormat = 'fixed' | 'csv';

interface DecodedBatch {
  processed: number;
  accepted: Entity[];
  rejections: RejectedRecord[];
}

type Source<T> = AsyncIterable<T> | Iterable<T>;

@injectable()
export class IngestionService {
  constructor(
    @inject(TOKENS.RecordCodec) private codec: RecordCodec,
    @inject(TOKENS.Batcher) private batcher: Batcher,
    @inject(TOKENS.NameNormalizer) private normalizer: NameNormalizer,
    @inject(TOKENS.ArtifactStore) private store: IArtifactStore,
    @inject(TOKENS.MatchService) private matchService: MatchService,
    @inject(TOKENS.IngestionOptions) private options: IngestionOptions,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  /** Ingest a file from disk: fixed-width records by default, or a CSV export. */
  async ingest(filePath: string, format: BatchFormat = 'fixed'): Promise<IngestionResult> {
    const absolutePath = path.resolve(filePath);
    try {
      await fs.access(absolutePath);
    } catch {
      throw new NotFoundError('Batch file', absolutePath);
    }
    return format === 'csv'
      ? this.ingestRows(readCsvRows(absolutePath), absolutePath)
      : this.ingestLines(readRecordLines(absolutePath), absolutePath);
  }

  async ingestLines(lines: Source<string>, source = 'input'): Promise<IngestionResult> {
    return this.run(source, () => this.decodeBatch(lines));
  }

  /** Rows of a CSV export, already split into header → cell maps. */
  async ingestRows(rows: Source<CsvRow>, source = 'input'): Promise<IngestionResult> {
    return this.run(source, () => this.convertRows(rows));
  }

  private async run(source: string, collect: () => Promise<DecodedBatch>): Promise<IngestionResult> {
    const startTime = Date.now();
    this.log.info({ source }, 'Starting registry ingestion');

    try {
      const { processed, accepted, rejections } = await collect();
      if (processed > 0 && accepted.length === 0) {
        throw new AppError(`None of the ${processed} records in ${source} could be ingested`, 422);
      }

      const index = MatchIndex.build(accepted, this.normalizer);

      let segmentsWritten = 0;
      for (const segment of this.batcher.segments(accepted)) {
        await this.store.writeSegment(segmentsWritten, segment);
        segmentsWritten++;
      }
      const pruned = await this.store.pruneSegments(segmentsWritten);
      if (pruned.length > 0) {
        this.log.info({ pruned: pruned.length }, 'Removed segments left by an earlier run');
      }
      await this.store.writeNameIndex(index.toDocument());
      this.matchService.publish(index);

      const result: IngestionResult = {
        totalProcessed: processed,
        totalAccepted: accepted.length,
        totalRejected: rejections.length,
        segmentsWritten,
        indexSize: index.size,
        durationMs: Date.now() - startTime,
        rejections,
      };

      await this.writeStatus(
        'success',
        `Ingested ${accepted.length} of ${processed} records from ${source} (${rejections.length} rejected)`,
      );
      this.log.info(
        {
          totalProcessed: result.totalProcessed,
          totalAccepted: result.totalAccepted,
          totalRejected: result.totalRejected,
          segmentsWritten,
          indexSize: result.indexSize,
          durationMs: result.durationMs,
        },
        'Registry ingestion complete',
      );
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.error({ err, source }, 'Registry ingestion failed');
      await this.writeStatus('failure', message);
      throw err;
    }
  }

  private async decodeBatch(lines: Source<string>): Promise<DecodedBatch> {
    const batch: DecodedBatch = { processed: 0, accepted: [], rejections: [] };
    const firstSeenOn = new Map<string, number>();
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      if (line.length === 0) continue;

      const outcome = this.codec.decodeLine(line, lineNumber);
      if (!outcome.ok) {
        batch.processed++;
        this.reject(outcome.error, lineNumber, batch.rejections);
        continue;
      }
      this.admit(outcome.entity, lineNumber, batch, firstSeenOn);
    }

    return batch;
  }

  /** CSV rows are numbered from 1, not counting the header. */
  private async convertRows(rows: Source<CsvRow>): Promise<DecodedBatch> {
    const batch: DecodedBatch = { processed: 0, accepted: [], rejections: [] };
    const firstSeenOn = new Map<string, number>();
    let rowNumber = 0;

    for await (const row of rows) {
      rowNumber++;
      this.admit(entityFromCsvRow(row), rowNumber, batch, firstSeenOn);
    }

    return batch;
  }

  /** Count one record and accept it unless its document number was seen before. */
  private admit(entity: Entity, lineNumber: number, batch: DecodedBatch, firstSeenOn: Map<string, number>): void {
    batch.processed++;

    if (entity.documentNumber !== null) {
      const firstLine = firstSeenOn.get(entity.documentNumber);
      if (firstLine !== undefined) {
        this.reject(
          new ConflictError(
            `Duplicate document number ${entity.documentNumber} on line ${lineNumber} (first seen on line ${firstLine})`,
          ),
          lineNumber,
          batch.rejections,
        );
        return;
      }
      firstSeenOn.set(entity.documentNumber, lineNumber);
    }

    batch.accepted.push(entity);
    if (batch.processed % this.options.progressInterval === 0) {
      this.log.info({ processed: batch.processed }, 'Ingestion progress');
    }
  }

  private reject(error: AppError, lineNumber: number, rejections: RejectedRecord[]): void {
    if (this.options.onReject === 'halt') throw error;
    this.log.warn({ lineNumber, reason: error.message }, 'Record rejected');
    rejections.push({ lineNumber, reason: error.message });
  }

  private async writeStatus(outcome: RunOutcome, message: string): Promise<void> {
    await this.store.writeStatus({ timestamp: new Date().toISOString(), outcome, message });
  }
}
