import type { CommandResult } from '../types/process.js';
import type { CycleState, CycleStateStore, UpdateCycleReport, VerificationResult } from '../types/update-cycle.js';
import { logThought } from '../utils/logger.js';
import type { CandidateVerifier } from './candidate-verifier.js';
import type { CycleDecider } from './cycle-decider.js';
import type { DependencyInstaller } from './dependency-installer.js';
import type { HistoryLog } from './history-log.js';
import { InstallError, SyncError, describeCommandFailure, toErrorMessage } from './update-errors.js';
import type { VersionControl } from './version-control.js';

export interface UpdateCycleServiceOptions {
  stateStore: CycleStateStore;
  versionControl: VersionControl;
  installer: DependencyInstaller;
  verifier: Pick<CandidateVerifier, 'verify'>;
  decider: CycleDecider;
  history: HistoryLog;
}

/**
 * One sequential upgrade attempt: capture revision, pull, install, verify,
 * then commit or roll back. Runs only while an update request is pending and
 * always consumes it.
 */
export class UpdateCycleService {
  readonly #stateStore: CycleStateStore;
  readonly #versionControl: VersionControl;
  readonly #installer: DependencyInstaller;
  readonly #verifier: Pick<CandidateVerifier, 'verify'>;
  readonly #decider: CycleDecider;
  readonly #history: HistoryLog;

  constructor(options: UpdateCycleServiceOptions) {
    this.#stateStore = options.stateStore;
    this.#versionControl = options.versionControl;
    this.#installer = options.installer;
    this.#verifier = options.verifier;
    this.#decider = options.decider;
    this.#history = options.history;
  }

  /** `null` when no update is pending. Never rejects. */
  async runIfPending(signal?: AbortSignal): Promise<UpdateCycleReport | null> {
    let state: CycleState;
    try {
      state = await this.#stateStore.read();
    } catch (error: unknown) {
      const detail = toErrorMessage(error);
      await this.#history.append('warning', `Could not read the update request: ${detail}`);
      await logThought(`[UpdateCycle] Update request unreadable, skipping update: ${detail}`);
      return null;
    }

    if (state.status === 'idle') {
      return null;
    }

    const source = state.request.source ? ` by ${state.request.source}` : '';
    await logThought(`[UpdateCycle] Update requested${source}; starting cycle.`);
    return this.#run(signal);
  }

  async #run(signal?: AbortSignal): Promise<UpdateCycleReport> {
    let previousRevision: string | null = null;
    try {
      previousRevision = await this.#captureRevision();
      await this.#history.append('info', `Starting update from commit ${previousRevision}`);

      await this.#pullSource();
      await this.#installDependencies();

      const verification: VerificationResult = await this.#verifier.verify(signal);
      return await this.#decider.decide(previousRevision, verification);
    } catch (error: unknown) {
      return this.#decider.recover(error, previousRevision);
    }
  }

  async #captureRevision(): Promise<string> {
    try {
      return await this.#versionControl.currentRevision();
    } catch (error: unknown) {
      throw new SyncError(`could not capture current revision: ${toErrorMessage(error)}`);
    }
  }

  async #pullSource(): Promise<void> {
    let result: CommandResult;
    try {
      result = await this.#versionControl.pull();
    } catch (error: unknown) {
      throw new SyncError(`git pull failed: ${toErrorMessage(error)}`);
    }
    if (result.status !== 'ok') {
      throw new SyncError(describeCommandFailure(result), result);
    }
    await logThought('[UpdateCycle] Source updated.');
  }

  async #installDependencies(): Promise<void> {
    let result: CommandResult;
    try {
      result = await this.#installer.apply();
    } catch (error: unknown) {
      throw new InstallError(`Dependency install failed: ${toErrorMessage(error)}`);
    }
    if (result.status !== 'ok') {
      throw new InstallError(`Dependency install failed: ${describeCommandFailure(result)}`, result);
    }
    await logThought('[UpdateCycle] Dependencies installed.');
  }
}
