/**
 * Match Controller — HTTP Boundary for Name Resolution
 * Layer: Interfaces (HTTP)
 *
 * Thin: read the validated `name`, ask MatchService, send JSON. A miss
 * surfaces as NotFoundError from the service and becomes a 404 in the error
 * handler. Arrow functions keep `this` bound when Express calls them.
 */
import { MatchService } from '@application/services/MatchService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { totalTimeMs } from '@interfaces/http/middleware/requestTimer';
import type { Request, Response } from 'express';

export class MatchController {
  private service: MatchService;

  constructor() {
    this.service = container.resolve<MatchService>(TOKENS.MatchService);
  }

  resolve = (req: Request, res: Response): void => {
    const result = this.service.resolve(String(req.query.name));

    const elapsed = totalTimeMs(req);

    res.status(200).json({
      status: 'success',
      data: result,
      ...(elapsed != null && { meta: { totalTimeMs: elapsed } }),
    });
  };
}
