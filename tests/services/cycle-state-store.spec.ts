import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm, utimes, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { FileCycleStateStore } from '../../src/services/cycle-state-store.js';

describe('FileCycleStateStore', () => {
  let workspace = '';
  let markerPath = '';
  const now = (): Date => new Date('2026-03-04T05:06:07.000Z');

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'supervisor-marker-'));
    markerPath = path.join(workspace, '.update_request');
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('is idle while no marker exists', async () => {
    const store = new FileCycleStateStore({ markerPath, now });

    expect(await store.read()).toEqual({ status: 'idle' });
  });

  it('writes a request and reports it as pending', async () => {
    const store = new FileCycleStateStore({ markerPath, now });

    const state = await store.request('admin-api');

    const expected = { status: 'pending', request: { requestedAt: '2026-03-04T05:06:07.000Z', source: 'admin-api' } };
    expect(state).toEqual(expected);
    expect(await store.read()).toEqual(expected);
    expect(JSON.parse(await readFile(markerPath, 'utf8'))).toEqual(expected.request);
  });

  it('keeps the first request when asked again', async () => {
    const first = new FileCycleStateStore({ markerPath, now });
    await first.request('cli');
    const later = new FileCycleStateStore({ markerPath, now: () => new Date('2026-03-05T00:00:00.000Z') });

    const state = await later.request('admin-api');

    expect(state).toEqual({ status: 'pending', request: { requestedAt: '2026-03-04T05:06:07.000Z', source: 'cli' } });
  });

  it('treats an empty operator-created marker as pending since its mtime', async () => {
    await writeFile(markerPath, '', 'utf8');
    const modified = new Date('2026-02-01T10:00:00.000Z');
    await utimes(markerPath, modified, modified);
    const store = new FileCycleStateStore({ markerPath, now });

    expect(await store.read()).toEqual({
      status: 'pending',
      request: { requestedAt: '2026-02-01T10:00:00.000Z', source: null },
    });
  });

  it('clears the marker and tolerates clearing twice', async () => {
    const store = new FileCycleStateStore({ markerPath, now });
    await store.request('cli');

    await store.clear();
    await store.clear();

    expect(await store.read()).toEqual({ status: 'idle' });
  });
});
