/**
 * Request Validation Middleware Factory
 * Layer: Interfaces (HTTP)
 *
 * `validate(schema, source)` returns a middleware that checks one part of
 * the request against a Zod schema before the controller runs:
 *
 *   router.get('/', validate(matchQuerySchema, 'query'), controller.resolve);
 *   router.post('/ingest', validate(ingestBodySchema, 'body'), controller.ingest);
 *
 * On success the parsed value replaces `req[source]`, so the controller sees
 * trimmed/coerced data. Express 5 exposes `req.query` as a getter, so the
 * parsed value is installed as an own property rather than assigned.
 *
 * On failure a ValidationError (400) is thrown and the global error handler
 * answers; the controller is never reached.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';
import type { z } from 'zod/v4';

export function validate<T extends z.ZodType>(schema: T, source: 'query' | 'body' | 'params') {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req[source]);

    if (!result.success) {
      const messages = result.error.issues.map((issue) => issue.message).join('; ');
      throw new ValidationError(messages);
    }

    Object.defineProperty(req, source, {
      value: result.data,
      writable: true,
      enumerable: true,
      configurable: true,
    });
    next();
  };
}
