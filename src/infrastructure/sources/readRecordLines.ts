/**
 * Streams a batch file one record line at a time, so a full registry
 * extract is never held in memory as a single string. Line terminators
 * (\n or \r\n) are removed; blank lines are kept so line numbers stay true.
 * A trailing newline at end of file does not produce an extra empty line.
 */
import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';

export async function* readRecordLines(filePath: string): AsyncGenerator<string, void, unknown> {
  const stream = createReadStream(filePath, { encoding: 'utf-8', highWaterMark: 64 * 1024 });
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      yield line;
    }
  } finally {
    lines.close();
    stream.destroy();
  }
}
