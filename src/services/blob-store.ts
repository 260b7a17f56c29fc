import type { BlobSyncMode } from '../types/artifacts.js';
import type { CommandResult, CommandRunner } from '../types/process.js';
import { runCommand } from './command-runner.js';

/** Remote object storage mirrored against local directories. */
export interface BlobStore {
  /**
   * Bring `remotePath` down into `localDir`.
   * `copy` only adds and updates files; `mirror` also deletes local files missing remotely.
   */
  pull(remotePath: string, localDir: string, mode: BlobSyncMode): Promise<CommandResult>;
  /** Copy `localDir` up to `remotePath`. Never deletes anything on the remote. */
  push(localDir: string, remotePath: string): Promise<CommandResult>;
}

export interface RcloneBlobStoreOptions {
  remoteName: string;
  rcloneBinary?: string;
  timeoutMs: number;
  commandRunner?: CommandRunner;
}

function withTrailingSlash(value: string): string {
  return value.endsWith('/') ? value : `${value}/`;
}

export class RcloneBlobStore implements BlobStore {
  readonly #remoteName: string;
  readonly #rcloneBinary: string;
  readonly #timeoutMs: number;
  readonly #commandRunner: CommandRunner;

  constructor(options: RcloneBlobStoreOptions) {
    this.#remoteName = options.remoteName;
    this.#rcloneBinary = options.rcloneBinary ?? 'rclone';
    this.#timeoutMs = options.timeoutMs;
    this.#commandRunner = options.commandRunner ?? runCommand;
  }

  pull(remotePath: string, localDir: string, mode: BlobSyncMode): Promise<CommandResult> {
    const verb = mode === 'mirror' ? 'sync' : 'copy';
    return this.#rclone([verb, this.#remote(remotePath), withTrailingSlash(localDir)]);
  }

  push(localDir: string, remotePath: string): Promise<CommandResult> {
    return this.#rclone(['copy', withTrailingSlash(localDir), this.#remote(remotePath)]);
  }

  #remote(remotePath: string): string {
    const trimmed = remotePath.replace(/^\/+/, '');
    return withTrailingSlash(`${this.#remoteName}:${trimmed}`);
  }

  #rclone(args: string[]): Promise<CommandResult> {
    return this.#commandRunner(this.#rcloneBinary, args, { timeoutMs: this.#timeoutMs });
  }
}
