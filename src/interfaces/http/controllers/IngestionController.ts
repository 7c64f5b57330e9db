/**
 * Ingestion Controller — HTTP Trigger for a Registry Run
 * Layer: Interfaces (HTTP)
 *
 * Bridges HTTP and the IngestionService facade. The body has already passed
 * `ingestBodySchema`; the service does decoding, indexing and writing.
 *
 * In production this endpoint belongs behind admin-only authentication: a
 * run rewrites the published index.
 */
import { IngestionService } from '@application/services/IngestionService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { IArtifactStore } from '@domain/interfaces/IArtifactStore';
import { totalTimeMs } from '@interfaces/http/middleware/requestTimer';
import { NotFoundError } from '@shared/errors/AppError';
import type { Request, Response } from 'express';

export class IngestionController {
  private service: IngestionService;
  private store: IArtifactStore;

  constructor() {
    this.service = container.resolve<IngestionService>(TOKENS.IngestionService);
    this.store = container.resolve<IArtifactStore>(TOKENS.ArtifactStore);
  }

  ingest = async (req: Request, res: Response): Promise<void> => {
    const format = req.body.format === 'csv' ? 'csv' : 'fixed';
    const result = await this.service.ingest(String(req.body.filePath), format);
    const elapsed = totalTimeMs(req);
    res.status(200).json({
      status: 'success',
      data: result,
      ...(elapsed != null && { meta: { totalTimeMs: elapsed } }),
    });
  };

  status = async (_req: Request, res: Response): Promise<void> => {
    const status = await this.store.readStatus();
    if (status === null) throw new NotFoundError('Run status', 'no ingestion has run yet');
    res.status(200).json({ status: 'success', data: status });
  };
}
