import type {
  Clock,
  HealthProbe,
  ManagedProcess,
  ProcessExit,
  ProcessSpec,
  ProcessSupervisor,
} from '../types/process.js';
import type {
  ProbeObservation,
  VerificationOutcome,
  VerificationResult,
  VerificationState,
} from '../types/update-cycle.js';
import { systemClock } from '../utils/clock.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import { httpHealthProbe } from './health-probe.js';
import { toErrorMessage } from './update-errors.js';

export interface CandidateVerifierOptions {
  processSupervisor: ProcessSupervisor;
  /** How to start the candidate. Output must be captured so diagnostics can be reported. */
  launch: ProcessSpec;
  healthUrl: string;
  pollIntervalMs: number;
  maxAttempts: number;
  probeTimeoutMs: number;
  stopTimeoutMs: number;
  diagnosticLines: number;
  healthProbe?: HealthProbe;
  clock?: Clock;
}

interface Observation {
  kind: ProbeObservation;
  detail: string;
}

function describeExit(exit: ProcessExit | null): string {
  if (!exit) {
    return 'unknown status';
  }
  if (exit.signal) {
    return `signal ${exit.signal}`;
  }
  return `exit code ${exit.code ?? 'n/a'}`;
}

/**
 * Starts the updated service on the production port and decides whether it is
 * trustworthy.
 *
 * `idle → launching → polling → healthy | unhealthy | crashed`
 *
 * Every attempt checks process liveness first and the HTTP endpoint second, so
 * a hung process that never opens its port is not mistaken for healthy and a
 * dead one ends the wait immediately. Whatever the outcome, the candidate has
 * exited by the time `verify()` resolves.
 */
export class CandidateVerifier {
  readonly #processSupervisor: ProcessSupervisor;
  readonly #launch: ProcessSpec;
  readonly #healthUrl: string;
  readonly #pollIntervalMs: number;
  readonly #maxAttempts: number;
  readonly #probeTimeoutMs: number;
  readonly #stopTimeoutMs: number;
  readonly #diagnosticLines: number;
  readonly #healthProbe: HealthProbe;
  readonly #clock: Clock;

  constructor(options: CandidateVerifierOptions) {
    this.#processSupervisor = options.processSupervisor;
    this.#launch = options.launch;
    this.#healthUrl = options.healthUrl;
    this.#pollIntervalMs = Math.max(0, options.pollIntervalMs);
    this.#maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.#probeTimeoutMs = options.probeTimeoutMs;
    this.#stopTimeoutMs = options.stopTimeoutMs;
    this.#diagnosticLines = options.diagnosticLines;
    this.#healthProbe = options.healthProbe ?? httpHealthProbe;
    this.#clock = options.clock ?? systemClock;
  }

  async verify(signal?: AbortSignal): Promise<VerificationResult> {
    const transitions: VerificationState[] = ['idle', 'launching'];

    let candidate: ManagedProcess;
    try {
      candidate = this.#processSupervisor.spawn(this.#launch);
    } catch (error: unknown) {
      const message = toErrorMessage(error);
      transitions.push('crashed');
      await logThought(`[CandidateVerifier] Candidate could not be started: ${message}`);
      return {
        outcome: 'crashed',
        attempts: 0,
        detail: `Candidate could not be started: ${message}`,
        diagnostics: [scrubSensitiveText(message)],
        exit: null,
        transitions,
      };
    }

    transitions.push('polling');
    await logThought(
      `[CandidateVerifier] Candidate started (pid ${candidate.pid ?? 'n/a'}); polling ${this.#healthUrl} up to ${this.#maxAttempts} time(s).`,
    );

    let outcome: VerificationOutcome = 'unhealthy';
    let detail = '';
    let attempts = 0;
    let lastProbeDetail = 'no probe completed';

    try {
      const deadline = this.#clock.now() + this.#maxAttempts * this.#pollIntervalMs;

      while (attempts < this.#maxAttempts) {
        if (signal?.aborted) {
          detail = 'verification cancelled';
          break;
        }
        if (attempts > 0 && this.#clock.now() >= deadline) {
          detail = `verification deadline passed after ${attempts} attempt(s); last probe: ${lastProbeDetail}`;
          break;
        }

        attempts += 1;
        const observation = await this.#observe(candidate);

        if (observation.kind === 'dead') {
          outcome = 'crashed';
          detail = `Candidate exited with ${describeExit(candidate.exitStatus())} on attempt ${attempts}.`;
          break;
        }
        if (observation.kind === 'alive-healthy') {
          outcome = 'healthy';
          detail = `Candidate healthy on attempt ${attempts}: ${observation.detail}`;
          break;
        }

        lastProbeDetail = observation.detail;
        if (attempts >= this.#maxAttempts) {
          break;
        }
        try {
          await this.#clock.sleep(this.#pollIntervalMs, signal);
        } catch {
          detail = 'verification cancelled';
          break;
        }
      }

      if (outcome === 'unhealthy' && !candidate.isAlive()) {
        outcome = 'crashed';
        detail = `Candidate exited with ${describeExit(candidate.exitStatus())} on attempt ${attempts}.`;
      }
      if (outcome === 'unhealthy' && !detail) {
        detail = `No healthy response after ${attempts} attempt(s); last probe: ${lastProbeDetail}`;
      }
    } finally {
      await this.#stop(candidate);
    }

    transitions.push(outcome);
    const diagnostics = candidate
      .outputTail(this.#diagnosticLines)
      .map((line) => scrubSensitiveText(line));

    await logThought(`[CandidateVerifier] Verification finished: ${outcome}. ${detail}`);

    return {
      outcome,
      attempts,
      detail,
      diagnostics,
      exit: candidate.exitStatus(),
      transitions,
    };
  }

  async #observe(candidate: ManagedProcess): Promise<Observation> {
    if (!candidate.isAlive()) {
      return { kind: 'dead', detail: describeExit(candidate.exitStatus()) };
    }
    try {
      const probe = await this.#healthProbe(this.#healthUrl, this.#probeTimeoutMs);
      return { kind: probe.ok ? 'alive-healthy' : 'alive-unhealthy', detail: probe.detail };
    } catch (error: unknown) {
      return { kind: 'alive-unhealthy', detail: `Health probe threw: ${toErrorMessage(error)}` };
    }
  }

  /** Terminate and reap the candidate so the port is free before anything else starts. */
  async #stop(candidate: ManagedProcess): Promise<void> {
    if (!candidate.isAlive()) {
      await candidate.waitForExit(this.#stopTimeoutMs);
      return;
    }

    candidate.terminate('SIGTERM');
    const exit = await candidate.waitForExit(this.#stopTimeoutMs);
    if (exit) {
      return;
    }

    await logThought(
      `[CandidateVerifier] Candidate ignored SIGTERM for ${this.#stopTimeoutMs}ms; sending SIGKILL.`,
    );
    candidate.terminate('SIGKILL');
    await candidate.waitForExit();
  }
}
