/**
 * Integration Tests — Ingestion Endpoints
 *
 * POSTs a real batch file from a temp directory through the full app. The
 * artifact store is a jest.fn() double registered before createApp(), so the
 * IngestionService the controller resolves writes nothing to disk, and the
 * MatchService it publishes to is the one /matches reads.
 */
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { MatchService } from '@application/services/MatchService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { RecordCodec } from '@domain/codec/RecordCodec';
import { createRegistryLayout } from '@domain/layout/registryLayout';
import { NameNormalizer } from '@domain/matching/NameNormalizer';
import { createApp } from '@interfaces/http/app';
import { DEFAULT_NAME_SUFFIXES } from '@shared/constants';
import request from 'supertest';

import { simpleEntity } from '../helpers/fixtures';
import { createMockArtifactStore } from '../helpers/mockArtifactStore';
import { createSilentLogger } from '../helpers/silentLogger';

const store = createMockArtifactStore();
const normalizer = new NameNormalizer({ suffixes: DEFAULT_NAME_SUFFIXES });
container.registerInstance(TOKENS.ArtifactStore, store);
container.registerInstance(TOKENS.NameNormalizer, normalizer);
container.registerInstance(TOKENS.MatchService, new MatchService(normalizer, store, createSilentLogger()));

const app = createApp();
const codec = new RecordCodec(createRegistryLayout());

describe('Ingestion endpoints', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'registry-http-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('GET /api/v1/ingest/status', () => {
    it('should return 404 before any run', async () => {
      const res = await request(app).get('/api/v1/ingest/status');

      expect(res.status).toBe(404);
      expect(res.body.message).toBe('Run status not found: no ingestion has run yet');
    });

    it('should return the last status document', async () => {
      const status = { timestamp: '2024-05-01T08:00:00.000Z', outcome: 'success', message: 'Ingested 2 of 2' };
      store.readStatus.mockResolvedValueOnce(status);

      const res = await request(app).get('/api/v1/ingest/status');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'success', data: status });
    });
  });

  describe('POST /api/v1/ingest', () => {
    it('should ingest a batch file and make its names resolvable', async () => {
      const filePath = path.join(tempDir, 'batch.txt');
      const lines = [
        codec.encode(simpleEntity('N20000000001', 'Seagrape Cove Association, Inc.')),
        'SHORT LINE',
        codec.encode(simpleEntity('N20000000002', 'Mangrove Point LLC')),
      ];
      await fs.writeFile(filePath, `${lines.join('\n')}\n`, 'utf-8');

      const res = await request(app).post('/api/v1/ingest').send({ filePath });

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('success');
      expect(res.body.data).toEqual(
        expect.objectContaining({
          totalProcessed: 3,
          totalAccepted: 2,
          totalRejected: 1,
          segmentsWritten: 1,
          indexSize: 2,
        }),
      );
      expect(res.body.data.rejections).toEqual([
        { lineNumber: 2, reason: 'LengthMismatch: expected a record of 1440 columns, got 10 on line 2' },
      ]);
      expect(store.writeNameIndex).toHaveBeenCalledWith({
        'SEAGRAPE COVE ASSOCIATION': 'N20000000001',
        'MANGROVE POINT': 'N20000000002',
      });

      const match = await request(app).get('/api/v1/matches').query({ name: 'MANGROVE POINT, L.L.C.' });
      expect(match.status).toBe(200);
      expect(match.body.data.documentNumber).toBe('N20000000002');
    });

    it('should ingest a CSV export when format is csv', async () => {
      const filePath = path.join(tempDir, 'export.csv');
      await fs.writeFile(
        filePath,
        'document_number,entity_name,city\nN30000000001,CORAL REEF TOWERS,SARASOTA\n',
        'utf-8',
      );

      const res = await request(app).post('/api/v1/ingest').send({ filePath, format: 'csv' });

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual(expect.objectContaining({ totalProcessed: 1, totalAccepted: 1, indexSize: 1 }));

      const match = await request(app).get('/api/v1/matches').query({ name: 'coral reef towers' });
      expect(match.status).toBe(200);
      expect(match.body.data.documentNumber).toBe('N30000000001');
    });

    it('should return 422 when no record in the file can be ingested', async () => {
      const filePath = path.join(tempDir, 'broken.txt');
      await fs.writeFile(filePath, 'SHORT LINE\n', 'utf-8');

      const res = await request(app).post('/api/v1/ingest').send({ filePath });

      expect(res.status).toBe(422);
      expect(res.body.message).toBe(`None of the 1 records in ${filePath} could be ingested`);
      expect(store.writeStatus).toHaveBeenLastCalledWith(
        expect.objectContaining({ outcome: 'failure', message: `None of the 1 records in ${filePath} could be ingested` }),
      );
    });

    it('should return 400 for an unknown format', async () => {
      const res = await request(app).post('/api/v1/ingest').send({ filePath: 'batch.txt', format: 'xml' });

      expect(res.status).toBe(400);
      expect(res.body.message).toBe("format must be 'fixed' or 'csv'");
    });

    it('should return 400 when filePath is missing', async () => {
      const res = await request(app).post('/api/v1/ingest').send({});

      expect(res.status).toBe(400);
      expect(res.body.message).toBe('filePath is required in the request body');
    });

    it('should return 404 when the file does not exist', async () => {
      const filePath = path.join(tempDir, 'missing.txt');

      const res = await request(app).post('/api/v1/ingest').send({ filePath });

      expect(res.status).toBe(404);
      expect(res.body.message).toBe(`Batch file not found: ${filePath}`);
    });
  });
});
