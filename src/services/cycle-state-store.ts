import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { CycleState, CycleStateStore, UpdateRequest } from '../types/update-cycle.js';

export interface FileCycleStateStoreOptions {
  markerPath: string;
  now?: () => Date;
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readOptionalString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Update-pending state kept in a marker file.
 *
 * Any file at the marker path means "pending", so an operator can still request
 * an upgrade with a plain `touch`. Requests made through this store record when
 * and by whom they were made.
 */
export class FileCycleStateStore implements CycleStateStore {
  readonly #markerPath: string;
  readonly #now: () => Date;

  constructor(options: FileCycleStateStoreOptions) {
    this.#markerPath = options.markerPath;
    this.#now = options.now ?? (() => new Date());
  }

  get markerPath(): string {
    return this.#markerPath;
  }

  async read(): Promise<CycleState> {
    let raw: string;
    let modifiedAt: Date;
    try {
      const stats = await stat(this.#markerPath);
      modifiedAt = stats.mtime;
      raw = await readFile(this.#markerPath, 'utf8');
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return { status: 'idle' };
      }
      throw error;
    }

    return { status: 'pending', request: this.#parseRequest(raw, modifiedAt) };
  }

  async request(source: string): Promise<CycleState> {
    const current = await this.read();
    if (current.status === 'pending') {
      return current;
    }

    const request: UpdateRequest = {
      requestedAt: this.#now().toISOString(),
      source: source.trim() || null,
    };
    await mkdir(path.dirname(this.#markerPath), { recursive: true });
    await writeFile(this.#markerPath, `${JSON.stringify(request)}\n`, 'utf8');
    return { status: 'pending', request };
  }

  async clear(): Promise<void> {
    await rm(this.#markerPath, { force: true });
  }

  #parseRequest(raw: string, modifiedAt: Date): UpdateRequest {
    const fallback: UpdateRequest = { requestedAt: modifiedAt.toISOString(), source: null };
    if (!raw.trim()) {
      return fallback;
    }
    try {
      const parsed = JSON.parse(raw) as unknown;
      if (!isObjectRecord(parsed)) {
        return fallback;
      }
      return {
        requestedAt: readOptionalString(parsed, 'requestedAt') ?? fallback.requestedAt,
        source: readOptionalString(parsed, 'source'),
      };
    } catch {
      return fallback;
    }
  }
}
