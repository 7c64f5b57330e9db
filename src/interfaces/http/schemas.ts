/**
 * Request schemas for the validate() middleware.
 */
import { z } from 'zod/v4';

export const matchQuerySchema = z.object({
  name: z.string({ error: 'name is required' }).trim().min(1, 'name must not be empty'),
});

export const ingestBodySchema = z.object({
  filePath: z.string({ error: 'filePath is required in the request body' }).min(1, 'filePath must not be empty'),
  format: z.enum(['fixed', 'csv'], { error: "format must be 'fixed' or 'csv'" }).default('fixed'),
});
