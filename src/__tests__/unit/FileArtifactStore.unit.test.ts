/**
 * Unit Tests — FileArtifactStore
 *
 * Runs against a fresh temp directory per test; nothing outside it is
 * touched.
 */
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { FileArtifactStore } from '@infrastructure/storage/FileArtifactStore';
import { AppError } from '@shared/errors/AppError';

describe('FileArtifactStore', () => {
  let tempDir: string;
  let outputDir: string;
  let store: FileArtifactStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'registry-store-'));
    outputDir = path.join(tempDir, 'out');
    store = new FileArtifactStore({ outputDir, segmentPrefix: 'segment-' });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should create the output directory and write numbered segments', async () => {
    const written = await store.writeSegment(3, 'A\nB\n');

    expect(written).toBe(path.join(outputDir, 'segment-3.txt'));
    await expect(fs.readFile(written, 'utf-8')).resolves.toBe('A\nB\n');
  });

  describe('pruneSegments', () => {
    it('should remove segments numbered at or above the kept count', async () => {
      for (const index of [0, 1, 2, 10]) await store.writeSegment(index, 'x\n');

      const removed = await store.pruneSegments(2);

      expect(removed).toEqual([path.join(outputDir, 'segment-2.txt'), path.join(outputDir, 'segment-10.txt')]);
      await expect(fs.readdir(outputDir).then((names) => names.sort())).resolves.toEqual([
        'segment-0.txt',
        'segment-1.txt',
      ]);
    });

    it('should leave files that are not segments alone', async () => {
      await store.writeSegment(0, 'x\n');
      await store.writeNameIndex({});
      await fs.writeFile(path.join(outputDir, 'segment-5.txt.bak'), '', 'utf-8');
      await fs.writeFile(path.join(outputDir, 'other-5.txt'), '', 'utf-8');
      await fs.writeFile(path.join(outputDir, 'segment-x.txt'), '', 'utf-8');

      await expect(store.pruneSegments(0)).resolves.toEqual([path.join(outputDir, 'segment-0.txt')]);
      await expect(fs.readdir(outputDir).then((names) => names.sort())).resolves.toEqual([
        'name-index.json',
        'other-5.txt',
        'segment-5.txt.bak',
        'segment-x.txt',
      ]);
    });

    it('should match the prefix literally', async () => {
      const dotted = new FileArtifactStore({ outputDir, segmentPrefix: 'seg.' });
      await dotted.writeSegment(4, 'x\n');
      await fs.writeFile(path.join(outputDir, 'segX4.txt'), '', 'utf-8');

      await expect(dotted.pruneSegments(1)).resolves.toEqual([path.join(outputDir, 'seg.4.txt')]);
      await expect(fs.readdir(outputDir)).resolves.toEqual(['segX4.txt']);
    });

    it('should remove nothing when the output directory does not exist yet', async () => {
      await expect(store.pruneSegments(0)).resolves.toEqual([]);
    });
  });

  it('should read back the name index it wrote', async () => {
    await store.writeNameIndex({ ALPHA: 'N1', BETA: 'N2' });

    await expect(store.readNameIndex()).resolves.toEqual({ ALPHA: 'N1', BETA: 'N2' });
  });

  it('should read null before anything was written', async () => {
    await expect(store.readNameIndex()).resolves.toBeNull();
    await expect(store.readStatus()).resolves.toBeNull();
  });

  it('should read back the run status it wrote', async () => {
    const status = { timestamp: '2024-03-01T12:00:00.000Z', outcome: 'success' as const, message: 'ok' };

    await store.writeStatus(status);

    await expect(store.readStatus()).resolves.toEqual(status);
  });

  it('should overwrite the previous status', async () => {
    await store.writeStatus({ timestamp: '2024-03-01T12:00:00.000Z', outcome: 'success', message: 'first' });
    await store.writeStatus({ timestamp: '2024-03-02T12:00:00.000Z', outcome: 'failure', message: 'second' });

    await expect(store.readStatus()).resolves.toEqual(
      expect.objectContaining({ outcome: 'failure', message: 'second' }),
    );
  });

  it('should refuse a name index that is not a string map', async () => {
    await fs.mkdir(outputDir, { recursive: true });
    await fs.writeFile(path.join(outputDir, 'name-index.json'), JSON.stringify({ ALPHA: 1 }), 'utf-8');

    await expect(store.readNameIndex()).rejects.toThrow(AppError);
  });

  it('should refuse a status document with an unknown outcome', async () => {
    await fs.mkdir(outputDir, { recursive: true });
    await fs.writeFile(
      path.join(outputDir, 'status.json'),
      JSON.stringify({ timestamp: 'now', outcome: 'partial', message: '' }),
      'utf-8',
    );

    await expect(store.readStatus()).rejects.toThrow('status.json is not a run status document');
  });
});
