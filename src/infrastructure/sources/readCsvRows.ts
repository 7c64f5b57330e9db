/**
 * Streams a CSV export one row at a time as a header → cell map. The first
 * line is the header; quoting and embedded commas are handled by csv-parser.
 */
import { createReadStream } from 'node:fs';

import type { CsvRow } from '@domain/codec/csvRowEntity';
import { AppError } from '@shared/errors/AppError';
import csv from 'csv-parser';
import { z } from 'zod/v4';

const csvRowSchema = z.record(z.string(), z.string());

export async function* readCsvRows(filePath: string): AsyncGenerator<CsvRow, void, unknown> {
  const stream = createReadStream(filePath, { encoding: 'utf-8' });
  const rows = stream.pipe(csv());
  let rowNumber = 0;
  try {
    for await (const raw of rows) {
      rowNumber++;
      const parsed = csvRowSchema.safeParse(raw);
      if (!parsed.success) {
        throw new AppError(`CSV row ${rowNumber} of ${filePath} is not a column → text map`, 500, false);
      }
      yield parsed.data;
    }
  } finally {
    rows.destroy();
    stream.destroy();
  }
}
