import type { CycleStateStore, UpdateCycleReport, VerificationResult } from '../types/update-cycle.js';
import { logThought } from '../utils/logger.js';
import type { DependencyInstaller } from './dependency-installer.js';
import type { HistoryLog } from './history-log.js';
import {
  InstallError,
  SyncError,
  VerificationError,
  describeCommandFailure,
  toErrorMessage,
} from './update-errors.js';
import type { VersionControl } from './version-control.js';

export interface CycleDeciderOptions {
  versionControl: VersionControl;
  stateStore: CycleStateStore;
  history: HistoryLog;
  /** When set, dependencies are reinstalled from the restored manifest after a code rollback. */
  rollbackInstaller?: DependencyInstaller;
}

function describeVerificationFailure(verification: VerificationResult): string {
  const excerpt = verification.diagnostics.join(' ').replace(/\s+/g, ' ').trim();
  const headline =
    verification.outcome === 'crashed'
      ? 'Server crashed after update'
      : 'Server failed health check after update';
  return excerpt ? `${headline}: ${excerpt}` : `${headline}: ${verification.detail}`;
}

/**
 * Ends an update cycle: keeps a verified update, otherwise restores the
 * revision captured when the cycle started. Either way the pending request is
 * consumed and exactly one terminal record is written to the history log.
 */
export class CycleDecider {
  readonly #versionControl: VersionControl;
  readonly #stateStore: CycleStateStore;
  readonly #history: HistoryLog;
  readonly #rollbackInstaller: DependencyInstaller | undefined;

  constructor(options: CycleDeciderOptions) {
    this.#versionControl = options.versionControl;
    this.#stateStore = options.stateStore;
    this.#history = options.history;
    this.#rollbackInstaller = options.rollbackInstaller;
  }

  async decide(previousRevision: string, verification: VerificationResult): Promise<UpdateCycleReport> {
    if (verification.outcome !== 'healthy') {
      return this.recover(
        new VerificationError(describeVerificationFailure(verification), verification),
        previousRevision,
      );
    }

    let newRevision: string;
    try {
      newRevision = await this.#versionControl.currentRevision();
    } catch (error: unknown) {
      newRevision = 'unknown';
      await logThought(`[CycleDecider] Could not read the new revision: ${toErrorMessage(error)}`);
    }

    await this.#consumeRequest();
    await this.#history.append('success', `Update to ${newRevision} successful`);
    await logThought(`[CycleDecider] Committed update ${previousRevision} -> ${newRevision}.`);

    return {
      decision: 'commit',
      previousRevision,
      newRevision,
      verification,
    };
  }

  /** Map any failure raised inside the cycle to its terminal outcome. */
  async recover(error: unknown, previousRevision: string | null): Promise<UpdateCycleReport> {
    const detail = toErrorMessage(error);

    if (error instanceof SyncError || previousRevision === null) {
      await this.#consumeRequest();
      await this.#history.append('error', `Update aborted: ${detail}`);
      await logThought(`[CycleDecider] Update aborted before any code change: ${detail}`);
      return {
        decision: 'aborted',
        stage: 'sync',
        previousRevision,
        detail,
      };
    }

    const restored = await this.#restore(previousRevision);
    await this.#consumeRequest();
    const outcome = restored
      ? `Rolled back to ${previousRevision}.`
      : `Rollback to ${previousRevision} did not complete.`;

    if (error instanceof VerificationError) {
      await this.#history.append('error', `${detail}. ${outcome}`);
      await logThought(`[CycleDecider] Verification failed. ${outcome}`);
      return {
        decision: 'rollback',
        stage: 'verification',
        previousRevision,
        detail,
        restored,
        verification: error.verification,
      };
    }

    const stageDetail = error instanceof InstallError ? detail : `Unexpected update failure: ${detail}`;
    await this.#history.append('error', `${stageDetail}. ${outcome}`);
    await logThought(`[CycleDecider] Install step failed. ${outcome}`);
    return {
      decision: 'rollback',
      stage: 'install',
      previousRevision,
      detail: stageDetail,
      restored,
    };
  }

  async #restore(previousRevision: string): Promise<boolean> {
    try {
      const reset = await this.#versionControl.resetTo(previousRevision);
      if (reset.status !== 'ok') {
        await this.#history.append(
          'error',
          `Rollback to ${previousRevision} failed: ${describeCommandFailure(reset)}`,
        );
        return false;
      }
    } catch (error: unknown) {
      await this.#history.append('error', `Rollback to ${previousRevision} failed: ${toErrorMessage(error)}`);
      return false;
    }

    if (this.#rollbackInstaller) {
      try {
        const reinstall = await this.#rollbackInstaller.apply();
        if (reinstall.status !== 'ok') {
          await this.#history.append(
            'warning',
            `Dependency reinstall after rollback failed: ${describeCommandFailure(reinstall)}`,
          );
        }
      } catch (error: unknown) {
        await this.#history.append(
          'warning',
          `Dependency reinstall after rollback failed: ${toErrorMessage(error)}`,
        );
      }
    }
    return true;
  }

  async #consumeRequest(): Promise<void> {
    try {
      await this.#stateStore.clear();
    } catch (error: unknown) {
      await this.#history.append('error', `Could not clear the update request: ${toErrorMessage(error)}`);
    }
  }
}
