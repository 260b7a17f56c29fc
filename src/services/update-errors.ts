import type { CommandResult } from '../types/process.js';
import type { CycleStage, VerificationResult } from '../types/update-cycle.js';
import { tailLines } from '../utils/command-line.js';

const OUTPUT_EXCERPT_LINES = 5;

/** Short, single-line description of a failed command for history messages. */
export function describeCommandFailure(result: CommandResult): string {
  const excerpt = tailLines(result.output, OUTPUT_EXCERPT_LINES).join(' ').trim();
  const cause =
    result.status === 'timeout'
      ? `timed out after ${result.durationMs}ms`
      : `failed with exit code ${result.exitCode ?? 'n/a'}`;
  return excerpt ? `${result.command} ${cause}: ${excerpt}` : `${result.command} ${cause}`;
}

export class UpdateCycleError extends Error {
  constructor(
    readonly stage: CycleStage,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Pulling new code failed; nothing beyond the revision capture happened. */
export class SyncError extends UpdateCycleError {
  constructor(
    message: string,
    readonly result?: CommandResult,
  ) {
    super('sync', message);
  }
}

/** Dependency installation failed after the code had already changed. */
export class InstallError extends UpdateCycleError {
  constructor(
    message: string,
    readonly result?: CommandResult,
  ) {
    super('install', message);
  }
}

/** The candidate never became healthy or died while being verified. */
export class VerificationError extends UpdateCycleError {
  constructor(
    message: string,
    readonly verification: VerificationResult,
  ) {
    super('verification', message);
  }
}

/** A blob-store transfer failed. Reported as a warning, never thrown out of the reconciler. */
export class ArtifactSyncError extends Error {
  constructor(
    message: string,
    readonly result?: CommandResult,
  ) {
    super(message);
    this.name = 'ArtifactSyncError';
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
