/**
 * Match Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1/matches`:
 *
 *   GET /api/v1/matches?name=Pelican%20Bay%20Foundation%20Inc  →  controller.resolve
 *
 * Built by a factory so the controller resolves its service when the app is
 * created, after any test overrides of the container.
 */
import { MatchController } from '@interfaces/http/controllers/MatchController';
import { validate } from '@interfaces/http/middleware/validation';
import { matchQuerySchema } from '@interfaces/http/schemas';
import { Router } from 'express';

export function createMatchRoutes(): Router {
  const router = Router();
  const controller = new MatchController();

  router.get('/', validate(matchQuerySchema, 'query'), controller.resolve);

  return router;
}
