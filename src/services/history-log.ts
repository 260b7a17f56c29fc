import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { HistoryRecord, HistoryStatus } from '../types/update-cycle.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

/** Also the ceiling: a configured limit can lower the cap, never raise it. */
export const DEFAULT_HISTORY_LIMIT = 50;

const HISTORY_STATUSES: readonly HistoryStatus[] = ['info', 'warning', 'success', 'error'];

export interface HistoryLogOptions {
  filePath: string;
  limit?: number;
  now?: () => Date;
}

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHistoryStatus(value: unknown): value is HistoryStatus {
  return HISTORY_STATUSES.some((status) => status === value);
}

/** Parse one line; `null` for blank, truncated or foreign lines. */
export function parseHistoryLine(line: string): HistoryRecord | null {
  const trimmed = line.trim();
  if (!trimmed) {
    return null;
  }
  try {
    const parsed = JSON.parse(trimmed) as unknown;
    if (
      !isObjectRecord(parsed) ||
      typeof parsed.timestamp !== 'string' ||
      !isHistoryStatus(parsed.status) ||
      typeof parsed.message !== 'string'
    ) {
      return null;
    }
    return { timestamp: parsed.timestamp, status: parsed.status, message: parsed.message };
  } catch {
    return null;
  }
}

/**
 * Append-only audit trail of update and sync attempts, one JSON object per
 * line, capped at the most recent `limit` lines.
 *
 * Appends are serialized and each one rewrites the file through a temporary
 * sibling plus rename, so readers never see a half-truncated log.
 */
export class HistoryLog {
  readonly #filePath: string;
  readonly #limit: number;
  readonly #now: () => Date;
  #queue: Promise<void> = Promise.resolve();

  constructor(options: HistoryLogOptions) {
    this.#filePath = options.filePath;
    this.#limit = Math.min(DEFAULT_HISTORY_LIMIT, Math.max(1, Math.floor(options.limit ?? DEFAULT_HISTORY_LIMIT)));
    this.#now = options.now ?? (() => new Date());
  }

  get filePath(): string {
    return this.#filePath;
  }

  /** Best effort: a failed write is reported to the operational log, never to the caller. */
  append(status: HistoryStatus, message: string): Promise<void> {
    const record: HistoryRecord = {
      timestamp: this.#now().toISOString(),
      status,
      message: scrubSensitiveText(message),
    };
    const next = this.#queue.then(() => this.#write(record));
    this.#queue = next.catch(async (error: unknown) => {
      const detail = error instanceof Error ? error.message : String(error);
      await logThought(`[HistoryLog] Failed to append to ${this.#filePath}: ${detail}`);
    });
    return this.#queue;
  }

  /** Records oldest first; `limit` keeps only the newest ones. */
  async read(limit?: number): Promise<HistoryRecord[]> {
    await this.#queue;
    const records = (await this.#readLines())
      .map((line) => parseHistoryLine(line))
      .filter((record): record is HistoryRecord => record !== null);
    if (limit === undefined || limit >= records.length) {
      return records;
    }
    return limit > 0 ? records.slice(-limit) : [];
  }

  async #write(record: HistoryRecord): Promise<void> {
    const lines = (await this.#readLines()).filter((line) => parseHistoryLine(line) !== null);
    lines.push(JSON.stringify(record));
    const kept = lines.slice(-this.#limit);

    const tempPath = `${this.#filePath}.tmp`;
    await mkdir(path.dirname(this.#filePath), { recursive: true });
    await writeFile(tempPath, `${kept.join('\n')}\n`, 'utf8');
    await rename(tempPath, this.#filePath);
  }

  async #readLines(): Promise<string[]> {
    try {
      const raw = await readFile(this.#filePath, 'utf8');
      return raw.split(/\r?\n/).filter((line) => line.trim().length > 0);
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }
}
