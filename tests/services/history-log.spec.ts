import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/utils/logger.js')>()),
  logThought: vi.fn(async () => undefined),
}));

import { HistoryLog, parseHistoryLine } from '../../src/services/history-log.js';
import { logThought } from '../../src/utils/logger.js';

describe('HistoryLog', () => {
  let workspace = '';
  let filePath = '';
  let tick = 0;
  const now = (): Date => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++));

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'supervisor-history-'));
    filePath = path.join(workspace, 'update_history.json');
    tick = 0;
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
    vi.clearAllMocks();
  });

  it('writes one JSON record per line', async () => {
    const history = new HistoryLog({ filePath, now });

    await history.append('info', 'Starting update from commit a1b2c3d');
    await history.append('success', 'Update to e4f5a6b successful');

    const raw = await readFile(filePath, 'utf8');
    expect(raw).toBe(
      '{"timestamp":"2026-01-01T00:00:00.000Z","status":"info","message":"Starting update from commit a1b2c3d"}\n' +
        '{"timestamp":"2026-01-01T00:00:01.000Z","status":"success","message":"Update to e4f5a6b successful"}\n',
    );
  });

  it.each([1, 49, 50, 51, 75])('keeps min(N, 50) of %i appends, newest last', async (count) => {
    const history = new HistoryLog({ filePath, now });

    for (let index = 1; index <= count; index += 1) {
      await history.append('info', `entry ${index}`);
    }

    const records = await history.read();
    expect(records).toHaveLength(Math.min(count, 50));
    expect(records[0]?.message).toBe(`entry ${Math.max(1, count - 49)}`);
    expect(records.at(-1)?.message).toBe(`entry ${count}`);
  });

  it('never keeps more than 50 records, whatever limit it is given', async () => {
    const history = new HistoryLog({ filePath, limit: 500, now });

    for (let index = 1; index <= 60; index += 1) {
      await history.append('info', `entry ${index}`);
    }

    const records = await history.read();
    expect(records).toHaveLength(50);
    expect(records[0]?.message).toBe('entry 11');
  });

  it('drops a torn line on the next append so it does not take up a slot', async () => {
    const history = new HistoryLog({ filePath, limit: 3, now });
    await writeFile(
      filePath,
      '{"timestamp":"2026-01-01T00:00:00.000Z","status":"info","message":"first"}\n{"timestamp":"2026-01-01T00\n',
      'utf8',
    );

    await history.append('info', 'second');
    await history.append('info', 'third');

    expect((await history.read()).map((record) => record.message)).toEqual(['first', 'second', 'third']);
    expect((await readFile(filePath, 'utf8')).split('\n').filter(Boolean)).toHaveLength(3);
  });

  it('serializes concurrent appends without losing records', async () => {
    const history = new HistoryLog({ filePath, limit: 10, now });

    await Promise.all(Array.from({ length: 8 }, (_, index) => history.append('info', `parallel ${index}`)));

    const records = await history.read();
    expect(records.map((record) => record.message)).toEqual(
      Array.from({ length: 8 }, (_, index) => `parallel ${index}`),
    );
  });

  it('skips a truncated last line and keeps earlier records', async () => {
    await writeFile(
      filePath,
      '{"timestamp":"2026-01-01T00:00:00.000Z","status":"error","message":"Update aborted"}\n{"timestamp":"2026-01-01T00',
      'utf8',
    );
    const history = new HistoryLog({ filePath, now });

    const records = await history.read();

    expect(records).toEqual([{ timestamp: '2026-01-01T00:00:00.000Z', status: 'error', message: 'Update aborted' }]);
  });

  it('returns only the newest records when a read limit is given', async () => {
    const history = new HistoryLog({ filePath, now });
    await history.append('info', 'first');
    await history.append('warning', 'second');
    await history.append('error', 'third');

    expect((await history.read(2)).map((record) => record.message)).toEqual(['second', 'third']);
    expect(await history.read(0)).toEqual([]);
  });

  it('returns an empty list when no log exists yet', async () => {
    const history = new HistoryLog({ filePath: path.join(workspace, 'missing.json'), now });

    expect(await history.read()).toEqual([]);
  });

  it('never rejects when the log cannot be written', async () => {
    const blocker = path.join(workspace, 'not-a-directory');
    await writeFile(blocker, 'file', 'utf8');
    const history = new HistoryLog({ filePath: path.join(blocker, 'update_history.json'), now });

    await expect(history.append('info', 'unwritable')).resolves.toBeUndefined();
    expect(vi.mocked(logThought)).toHaveBeenCalledTimes(1);
  });

  it('redacts credentials in messages', async () => {
    const history = new HistoryLog({ filePath, now });

    await history.append('error', 'rclone failed: token=test-secret-value');

    const records = await history.read();
    expect(records[0]?.message).toBe('rclone failed: token=[REDACTED]');
  });
});

describe('parseHistoryLine', () => {
  it('rejects unknown statuses and non-objects', () => {
    expect(parseHistoryLine('{"timestamp":"t","status":"fatal","message":"m"}')).toBeNull();
    expect(parseHistoryLine('["info"]')).toBeNull();
    expect(parseHistoryLine('   ')).toBeNull();
  });

  it('parses a well-formed record', () => {
    expect(parseHistoryLine('{"timestamp":"t","status":"warning","message":"m"}')).toEqual({
      timestamp: 't',
      status: 'warning',
      message: 'm',
    });
  });
});
