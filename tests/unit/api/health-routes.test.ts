/**
 * Health Routes Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import express from 'express';
import request from 'supertest';

// Mock the database client before importing routes
vi.mock('../../../src/database/client', () => ({
  db: {
    none: vi.fn(),
  },
}));

import { createHealthRoutes } from '../../../src/api/health-routes';
import { db } from '../../../src/database/client';

describe('Health Routes', () => {
  let app: express.Application;
  let checkStore: ReturnType<typeof vi.fn<[], Promise<unknown>>>;

  beforeEach(() => {
    vi.clearAllMocks();
    checkStore = vi.fn().mockResolvedValue('test-project');
    app = express();
    app.use(createHealthRoutes(checkStore));
  });

  it('should return healthy status when database is accessible', async () => {
    vi.mocked(db.none).mockResolvedValue(undefined);

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('healthy');
    expect(response.body.service).toBe('gc-policy-service');
    expect(response.body.checks.database).toBe('ok');
    expect(db.none).toHaveBeenCalledWith('SELECT 1');
  });

  it('should return unhealthy status when database is not accessible', async () => {
    vi.mocked(db.none).mockRejectedValue(new Error('Connection failed'));

    const response = await request(app).get('/health');

    expect(response.status).toBe(503);
    expect(response.body.status).toBe('unhealthy');
    expect(response.body.error).toBe('Connection failed');
    expect(response.body.checks.database).toBe('failed');
  });

  it('should be ready when the admin client resolves its project', async () => {
    const response = await request(app).get('/health/ready');

    expect(response.status).toBe(200);
    expect(response.body.ready).toBe(true);
    expect(response.body.checks.bigtable).toBe('ok');
    expect(checkStore).toHaveBeenCalledTimes(1);
  });

  it('should not be ready when the admin client cannot authenticate', async () => {
    checkStore.mockRejectedValue(new Error('Could not load the default credentials'));

    const response = await request(app).get('/health/ready');

    expect(response.status).toBe(503);
    expect(response.body).toMatchObject({
      ready: false,
      error: 'Could not load the default credentials',
      checks: { bigtable: 'failed' },
    });
  });
});
