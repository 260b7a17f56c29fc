import type { ReconcileReport } from '../types/artifacts.js';
import type { SupervisorRunReport, UpdateCycleReport } from '../types/update-cycle.js';
import { logThought } from '../utils/logger.js';
import type { ArtifactReconciler } from '../services/artifact-reconciler.js';
import type { ProductionHandoff } from '../services/production-handoff.js';
import type { UpdateCycleService } from '../services/update-cycle.js';
import { toErrorMessage } from '../services/update-errors.js';

export interface SupervisorOptions {
  updateCycle: Pick<UpdateCycleService, 'runIfPending'>;
  reconciler: Pick<ArtifactReconciler, 'reconcile'>;
  handoff: Pick<ProductionHandoff, 'handoff'>;
}

function summarizeCycle(cycle: UpdateCycleReport | null): string {
  if (!cycle) {
    return 'no update pending';
  }
  switch (cycle.decision) {
    case 'commit':
      return `committed ${cycle.previousRevision} -> ${cycle.newRevision}`;
    case 'rollback':
      return `rolled back to ${cycle.previousRevision} after ${cycle.stage} failure`;
    case 'aborted':
      return `aborted during ${cycle.stage}`;
  }
}

/**
 * Top-level sequence: pending update cycle, artifact reconciliation, then the
 * production server. Nothing before the handoff can stop it from happening.
 */
export class Supervisor {
  readonly #updateCycle: Pick<UpdateCycleService, 'runIfPending'>;
  readonly #reconciler: Pick<ArtifactReconciler, 'reconcile'>;
  readonly #handoff: Pick<ProductionHandoff, 'handoff'>;

  constructor(options: SupervisorOptions) {
    this.#updateCycle = options.updateCycle;
    this.#reconciler = options.reconciler;
    this.#handoff = options.handoff;
  }

  /** Update cycle (if pending) and reconciliation. Never rejects. */
  async prepare(signal?: AbortSignal): Promise<SupervisorRunReport> {
    let cycle: UpdateCycleReport | null = null;
    try {
      cycle = await this.#updateCycle.runIfPending(signal);
    } catch (error: unknown) {
      await logThought(`[Supervisor] Update cycle raised unexpectedly: ${toErrorMessage(error)}`);
    }

    let reconcile: ReconcileReport;
    try {
      reconcile = await this.#reconciler.reconcile();
    } catch (error: unknown) {
      const detail = `Artifact reconciliation raised unexpectedly: ${toErrorMessage(error)}`;
      await logThought(`[Supervisor] ${detail}`);
      reconcile = { steps: [], warnings: [detail] };
    }

    await logThought(
      `[Supervisor] Startup prepared: ${summarizeCycle(cycle)}; ${reconcile.warnings.length} artifact warning(s).`,
    );
    return { cycle, reconcile };
  }

  /**
   * Resolves with the production server's exit code, or `null` when `signal`
   * was aborted before the handoff (the operator asked the supervisor to stop).
   */
  async run(passthroughArgs: readonly string[], signal?: AbortSignal): Promise<number | null> {
    await this.prepare(signal);
    if (signal?.aborted) {
      await logThought('[Supervisor] Stop requested during startup; production server not started.');
      return null;
    }
    return this.#handoff.handoff(passthroughArgs);
  }
}
