/**
 * File Artifact Store — Run Output on Local Disk
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements IArtifactStore)
 *
 * Layout of the output directory:
 *
 *   <outputDir>/<prefix>0.txt, <prefix>1.txt, …   encoded segments
 *   <outputDir>/name-index.json                   canonical name → document number
 *   <outputDir>/status.json                       { timestamp, outcome, message }
 *
 * Segments numbered past the latest run's count are pruned, so the directory
 * holds one run's segments. The directory is created on first write. JSON
 * documents read back from disk are validated with Zod; a document that does
 * not have the expected shape is an error, not an empty index.
 */
import fs from 'node:fs/promises';
import path from 'node:path';

import type { IArtifactStore } from '@domain/interfaces/IArtifactStore';
import type { NameIndexDocument } from '@domain/matching/MatchIndex';
import { NAME_INDEX_FILE, STATUS_FILE } from '@shared/constants';
import { AppError } from '@shared/errors/AppError';
import type { RunStatus } from '@shared/types';
import { z } from 'zod/v4';

const nameIndexSchema = z.record(z.string(), z.string());

const runStatusSchema = z.object({
  timestamp: z.string(),
  outcome: z.enum(['success', 'failure']),
  message: z.string(),
});

export interface FileArtifactStoreOptions {
  outputDir: string;
  segmentPrefix: string;
}

export class FileArtifactStore implements IArtifactStore {
  private readonly outputDir: string;
  private readonly segmentPrefix: string;

  constructor(options: FileArtifactStoreOptions) {
    this.outputDir = path.resolve(options.outputDir);
    this.segmentPrefix = options.segmentPrefix;
  }

  async writeSegment(index: number, content: string): Promise<string> {
    const filePath = path.join(this.outputDir, `${this.segmentPrefix}${index}.txt`);
    await this.write(filePath, content);
    return filePath;
  }

  async pruneSegments(keep: number): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.outputDir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const pattern = new RegExp(`^${escapeRegExp(this.segmentPrefix)}(\\d+)\\.txt$`);
    const stale = entries
      .map((entry) => ({ entry, match: pattern.exec(entry) }))
      .filter(({ match }) => match !== null && Number(match[1]) >= keep)
      .map(({ entry }) => entry)
      .sort((a, b) => a.localeCompare(b, 'en', { numeric: true }));

    const removed: string[] = [];
    for (const entry of stale) {
      const filePath = path.join(this.outputDir, entry);
      await fs.rm(filePath, { force: true });
      removed.push(filePath);
    }
    return removed;
  }

  async writeNameIndex(document: NameIndexDocument): Promise<void> {
    await this.write(path.join(this.outputDir, NAME_INDEX_FILE), JSON.stringify(document, null, 2));
  }

  async readNameIndex(): Promise<NameIndexDocument | null> {
    const raw = await this.readJson(NAME_INDEX_FILE);
    if (raw === null) return null;
    const parsed = nameIndexSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AppError(`${NAME_INDEX_FILE} is not a name → document number map`, 500, false);
    }
    return parsed.data;
  }

  async writeStatus(status: RunStatus): Promise<void> {
    await this.write(path.join(this.outputDir, STATUS_FILE), JSON.stringify(status, null, 2));
  }

  async readStatus(): Promise<RunStatus | null> {
    const raw = await this.readJson(STATUS_FILE);
    if (raw === null) return null;
    const parsed = runStatusSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AppError(`${STATUS_FILE} is not a run status document`, 500, false);
    }
    return parsed.data;
  }

  private async write(filePath: string, content: string): Promise<void> {
    await fs.mkdir(this.outputDir, { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }

  private async readJson(fileName: string): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(path.join(this.outputDir, fileName), 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    return JSON.parse(text);
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
