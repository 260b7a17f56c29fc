import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import express, { type Express } from 'express';
import request from 'supertest';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/utils/logger.js')>()),
  logThought: vi.fn(async () => undefined),
}));

import { createUpdateAdminRouter } from '../../src/api/router.js';
import { parseLimitQuery } from '../../src/api/handlers/update-admin.js';
import { FileCycleStateStore } from '../../src/services/cycle-state-store.js';
import { HistoryLog } from '../../src/services/history-log.js';

const FIXED_NOW = new Date('2026-03-04T05:06:07.000Z');

describe('update admin API', () => {
  let workspace = '';
  let app: Express;
  let stateStore: FileCycleStateStore;
  let history: HistoryLog;
  let onUpdateRequested: ReturnType<typeof vi.fn>;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'supervisor-admin-api-'));
    stateStore = new FileCycleStateStore({ markerPath: path.join(workspace, '.update_request'), now: () => FIXED_NOW });
    history = new HistoryLog({ filePath: path.join(workspace, 'update_history.json'), now: () => FIXED_NOW });
    onUpdateRequested = vi.fn();

    app = express();
    app.use(createUpdateAdminRouter({ stateStore, history, onUpdateRequested }));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('initiates an update once and reports later triggers as already pending', async () => {
    const first = await request(app).post('/admin/trigger-update').send({ source: 'release-pipeline' });

    expect(first.status).toBe(200);
    expect(first.body.ok).toBe(true);
    expect(first.body.data).toEqual({ status: 'update_initiated', requestedAt: '2026-03-04T05:06:07.000Z' });
    expect(typeof first.body.correlationId).toBe('string');
    await vi.waitFor(() => expect(onUpdateRequested).toHaveBeenCalledTimes(1));

    const second = await request(app).post('/admin/trigger-update').send({});

    expect(second.body.data).toEqual({ status: 'already_pending', requestedAt: '2026-03-04T05:06:07.000Z' });
    expect(await stateStore.read()).toEqual({
      status: 'pending',
      request: { requestedAt: '2026-03-04T05:06:07.000Z', source: 'release-pipeline' },
    });
    expect((await history.read()).map((record) => record.message)).toEqual(['Update requested by release-pipeline']);
  });

  it('defaults the source when the body names none', async () => {
    await request(app).post('/admin/trigger-update');

    expect(await stateStore.read()).toMatchObject({ request: { source: 'admin-api' } });
  });

  it('rejects a source that is not a string', async () => {
    const response = await request(app).post('/admin/trigger-update').send({ source: 42 });

    expect(response.status).toBe(400);
    expect(response.body).toMatchObject({
      ok: false,
      error: "Field 'source' must be a non-empty string when provided.",
    });
    expect(await stateStore.read()).toEqual({ status: 'idle' });
    expect(onUpdateRequested).not.toHaveBeenCalled();
  });

  it('returns an empty error list before any update ran', async () => {
    const response = await request(app).get('/admin/update-errors');

    expect(response.status).toBe(200);
    expect(response.body.data).toEqual([]);
  });

  it('returns only error records from the history', async () => {
    await history.append('info', 'Starting update from commit a1b2c3d');
    await history.append('error', 'Server crashed after update: boom. Rolled back to a1b2c3d.');
    await history.append('warning', 'Model pull failed');

    const response = await request(app).get('/admin/update-errors');

    expect(response.body.data).toEqual([
      {
        timestamp: '2026-03-04T05:06:07.000Z',
        status: 'error',
        message: 'Server crashed after update: boom. Rolled back to a1b2c3d.',
      },
    ]);
  });

  it('limits the history to the newest records', async () => {
    await history.append('info', 'Starting update from commit a1b2c3d');
    await history.append('success', 'Update to e4f5a6b successful');

    const response = await request(app).get('/admin/update-history?limit=1');

    expect(response.status).toBe(200);
    expect(response.body.data.map((record: { message: string }) => record.message)).toEqual([
      'Update to e4f5a6b successful',
    ]);
  });

  it('rejects a malformed history limit', async () => {
    const response = await request(app).get('/admin/update-history?limit=-3');

    expect(response.status).toBe(400);
    expect(response.body.error).toBe("Query parameter 'limit' must be a non-negative integer.");
  });

  it('reports the pending request and the newest record', async () => {
    await stateStore.request('operator');
    await history.append('info', 'Update requested by operator');

    const response = await request(app).get('/admin/update-status');

    expect(response.body.data).toEqual({
      pending: true,
      requestedAt: '2026-03-04T05:06:07.000Z',
      source: 'operator',
      lastRecord: {
        timestamp: '2026-03-04T05:06:07.000Z',
        status: 'info',
        message: 'Update requested by operator',
      },
    });
  });
});

describe('parseLimitQuery', () => {
  it('accepts digits and rejects everything else', () => {
    expect(parseLimitQuery(undefined)).toBeUndefined();
    expect(parseLimitQuery('25')).toBe(25);
    expect(() => parseLimitQuery('2.5')).toThrow("Query parameter 'limit' must be a non-negative integer.");
    expect(() => parseLimitQuery(['1', '2'])).toThrow();
  });
});
