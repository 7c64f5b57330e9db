/**
 * Integration Tests — Health Endpoint
 *
 * `GET /api/v1/health` through the whole middleware chain with Supertest,
 * which drives the app in memory without binding a port.
 *
 * Health only says the process is up. It is independent of the match index,
 * which this file never loads, so /matches answers 503 here.
 */
import { createApp } from '@interfaces/http/app';
import request from 'supertest';

describe('GET /api/v1/health', () => {
  const app = createApp();

  it('should return 200 with status "ok"', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
  });

  it('should include an uptime value (number of seconds)', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(typeof res.body.uptime).toBe('number');
    expect(res.body.uptime).toBeGreaterThanOrEqual(0);
  });

  it('should include a valid ISO 8601 timestamp', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(res.body.timestamp).toBeDefined();
    const parsed = new Date(res.body.timestamp);
    expect(parsed.toISOString()).toBe(res.body.timestamp);
  });

  it('should stay healthy while no match index is loaded', async () => {
    const health = await request(app).get('/api/v1/health');
    const lookup = await request(app).get('/api/v1/matches').query({ name: 'anything' });

    expect(health.status).toBe(200);
    expect(lookup.status).toBe(503);
  });

  it('should return JSON content type', async () => {
    const res = await request(app).get('/api/v1/health');

    expect(res.headers['content-type']).toMatch(/application\/json/);
  });
});
