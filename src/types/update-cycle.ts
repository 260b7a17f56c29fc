import type { ProcessExit } from './process.js';
import type { ReconcileReport } from './artifacts.js';

export type HistoryStatus = 'info' | 'warning' | 'success' | 'error';

export interface HistoryRecord {
  /** ISO-8601 instant. */
  timestamp: string;
  status: HistoryStatus;
  message: string;
}

export interface UpdateRequest {
  requestedAt: string | null;
  source: string | null;
}

export type CycleState =
  | { status: 'idle' }
  | { status: 'pending'; request: UpdateRequest };

export interface CycleStateStore {
  read(): Promise<CycleState>;
  /** Persist a pending update request. Idempotent while one is pending. */
  request(source: string): Promise<CycleState>;
  /** Consume the pending request. No-op when idle. */
  clear(): Promise<void>;
}

export type CycleStage = 'sync' | 'install' | 'verification';

export type VerificationState = 'idle' | 'launching' | 'polling' | 'healthy' | 'unhealthy' | 'crashed';

export type VerificationOutcome = Extract<VerificationState, 'healthy' | 'unhealthy' | 'crashed'>;

/** What a single polling attempt observed. */
export type ProbeObservation = 'alive-healthy' | 'alive-unhealthy' | 'dead';

export interface VerificationResult {
  outcome: VerificationOutcome;
  attempts: number;
  detail: string;
  /** Tail of the candidate's captured output, oldest line first. */
  diagnostics: string[];
  exit: ProcessExit | null;
  transitions: VerificationState[];
}

export type CycleDecision = 'commit' | 'rollback' | 'aborted';

export type UpdateCycleReport =
  | {
      decision: 'commit';
      previousRevision: string;
      newRevision: string;
      verification: VerificationResult;
    }
  | {
      decision: 'rollback';
      stage: Extract<CycleStage, 'install' | 'verification'>;
      previousRevision: string;
      detail: string;
      restored: boolean;
      verification?: VerificationResult;
    }
  | {
      decision: 'aborted';
      stage: 'sync';
      previousRevision: string | null;
      detail: string;
    };

export interface SupervisorRunReport {
  /** `null` when no update was pending. */
  cycle: UpdateCycleReport | null;
  reconcile: ReconcileReport;
}
