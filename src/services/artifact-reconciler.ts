import { mkdir, readdir } from 'node:fs/promises';
import type { ArtifactStep, ArtifactStepResult, BlobSyncMode, ReconcileReport } from '../types/artifacts.js';
import type { CommandResult } from '../types/process.js';
import { logThought } from '../utils/logger.js';
import type { BlobStore } from './blob-store.js';
import type { HistoryLog } from './history-log.js';
import { ArtifactSyncError, describeCommandFailure, toErrorMessage } from './update-errors.js';

export interface ArtifactReconcilerOptions {
  blobStore: BlobStore;
  history: HistoryLog;
  storageDir: string;
  remoteStoragePath: string;
  modelDir: string;
  remoteModelPath: string;
}

async function isEmptyDirectory(directory: string): Promise<boolean> {
  try {
    const entries = await readdir(directory);
    return entries.length === 0;
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return true;
    }
    throw error;
  }
}

/**
 * Startup reconciliation of local artifact trees against the blob store.
 *
 * - storage: pulled only to bootstrap an empty directory, then always pushed
 *   back with copy semantics as a backup;
 * - model: pulled (mirrored) from the remote, never pushed from here.
 *
 * Every failure becomes a warning; startup always continues.
 */
export class ArtifactReconciler {
  readonly #blobStore: BlobStore;
  readonly #history: HistoryLog;
  readonly #storageDir: string;
  readonly #remoteStoragePath: string;
  readonly #modelDir: string;
  readonly #remoteModelPath: string;

  constructor(options: ArtifactReconcilerOptions) {
    this.#blobStore = options.blobStore;
    this.#history = options.history;
    this.#storageDir = options.storageDir;
    this.#remoteStoragePath = options.remoteStoragePath;
    this.#modelDir = options.modelDir;
    this.#remoteModelPath = options.remoteModelPath;
  }

  async reconcile(): Promise<ReconcileReport> {
    const steps: ArtifactStepResult[] = [];
    const warnings: string[] = [];
    const record = async (result: ArtifactStepResult, error?: ArtifactSyncError): Promise<void> => {
      steps.push(result);
      if (error) {
        warnings.push(error.message);
        await this.#history.append('warning', error.message);
      }
    };

    const bootstrap = await this.#bootstrapStorage();
    await record(bootstrap.result, bootstrap.error);

    const backup = await this.#transfer(
      'storage-backup',
      () => this.#blobStore.push(this.#storageDir, this.#remoteStoragePath),
      'Storage backup push',
    );
    await record(backup.result, backup.error);

    const model = await this.#transfer(
      'model-pull',
      () => this.#pull(this.#remoteModelPath, this.#modelDir, 'mirror'),
      'Model pull',
    );
    await record(model.result, model.error);

    await logThought(
      `[ArtifactReconciler] ${steps.map((step) => `${step.step}=${step.status}`).join(', ')}`,
    );
    return { steps, warnings };
  }

  async #bootstrapStorage(): Promise<{ result: ArtifactStepResult; error?: ArtifactSyncError }> {
    let empty: boolean;
    try {
      empty = await isEmptyDirectory(this.#storageDir);
    } catch (error: unknown) {
      const failure = new ArtifactSyncError(`Storage directory unreadable: ${toErrorMessage(error)}`);
      return { result: { step: 'storage-bootstrap', status: 'warning', detail: failure.message }, error: failure };
    }

    if (!empty) {
      return {
        result: { step: 'storage-bootstrap', status: 'skipped', detail: 'Local storage already populated.' },
      };
    }

    const outcome = await this.#transfer(
      'storage-bootstrap',
      () => this.#pull(this.#remoteStoragePath, this.#storageDir, 'copy'),
      'Storage bootstrap pull',
    );
    if (!outcome.error) {
      await this.#history.append('info', `Local storage restored from ${this.#remoteStoragePath}`);
    }
    return outcome;
  }

  async #pull(remotePath: string, localDir: string, mode: BlobSyncMode): Promise<CommandResult> {
    await mkdir(localDir, { recursive: true });
    return this.#blobStore.pull(remotePath, localDir, mode);
  }

  async #transfer(
    step: ArtifactStep,
    run: () => Promise<CommandResult>,
    label: string,
  ): Promise<{ result: ArtifactStepResult; error?: ArtifactSyncError }> {
    try {
      const result = await run();
      if (result.status === 'ok') {
        return { result: { step, status: 'ok', detail: `${label} completed.` } };
      }
      const failure = new ArtifactSyncError(`${label} failed: ${describeCommandFailure(result)}`, result);
      return { result: { step, status: 'warning', detail: failure.message }, error: failure };
    } catch (error: unknown) {
      const failure = new ArtifactSyncError(`${label} failed: ${toErrorMessage(error)}`);
      return { result: { step, status: 'warning', detail: failure.message }, error: failure };
    }
  }
}
