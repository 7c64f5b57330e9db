/**
 * Ingestion Routes
 * Layer: Interfaces (HTTP)
 *
 *   POST /api/v1/ingest         { "filePath": "./data/cordata.txt", "format"?: "fixed" | "csv" }
 *   GET  /api/v1/ingest/status  → last run's status document
 *
 * The ingest CLI script (npm run ingest) is the usual way to load a batch;
 * this endpoint exists for programmatic triggering.
 */
import { IngestionController } from '@interfaces/http/controllers/IngestionController';
import { validate } from '@interfaces/http/middleware/validation';
import { ingestBodySchema } from '@interfaces/http/schemas';
import { Router } from 'express';

export function createIngestionRoutes(): Router {
  const router = Router();
  const controller = new IngestionController();

  router.post('/ingest', validate(ingestBodySchema, 'body'), controller.ingest);
  router.get('/ingest/status', controller.status);

  return router;
}
