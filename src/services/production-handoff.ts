import { constants } from 'node:os';
import type { ManagedProcess, ProcessExit, ProcessSupervisor } from '../types/process.js';
import { logThought } from '../utils/logger.js';
import { toErrorMessage } from './update-errors.js';

const RELAYED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface ProductionHandoffOptions {
  processSupervisor: ProcessSupervisor;
  command: string;
  /** Arguments that always precede the passthrough arguments (host, port, app). */
  baseArgs: readonly string[];
  cwd: string;
  env?: NodeJS.ProcessEnv;
  signalSource?: SignalSource;
}

export function exitCodeFor(exit: ProcessExit | null): number {
  if (!exit) {
    return 1;
  }
  if (exit.code !== null) {
    return exit.code;
  }
  if (exit.signal) {
    return 128 + (constants.signals[exit.signal] ?? 0);
  }
  return 1;
}

/**
 * Starts the production server in the foreground and stands in for it.
 *
 * Node cannot replace its own process image, so the supervisor keeps nothing
 * but this child: stdio is inherited, termination signals are relayed, and
 * the returned exit code mirrors the server's.
 */
export class ProductionHandoff {
  readonly #processSupervisor: ProcessSupervisor;
  readonly #command: string;
  readonly #baseArgs: readonly string[];
  readonly #cwd: string;
  readonly #env: NodeJS.ProcessEnv | undefined;
  readonly #signalSource: SignalSource;

  constructor(options: ProductionHandoffOptions) {
    this.#processSupervisor = options.processSupervisor;
    this.#command = options.command;
    this.#baseArgs = options.baseArgs;
    this.#cwd = options.cwd;
    this.#env = options.env;
    this.#signalSource = options.signalSource ?? process;
  }

  async handoff(passthroughArgs: readonly string[]): Promise<number> {
    const args = [...this.#baseArgs, ...passthroughArgs];
    await logThought(`[ProductionHandoff] Starting production server: ${this.#command} ${args.join(' ')}`);

    let server: ManagedProcess;
    try {
      server = this.#processSupervisor.spawn({
        command: this.#command,
        args,
        cwd: this.#cwd,
        env: this.#env,
        stdio: 'inherit',
      });
    } catch (error: unknown) {
      await logThought(`[ProductionHandoff] Production server failed to start: ${toErrorMessage(error)}`);
      return 1;
    }

    const relays = RELAYED_SIGNALS.map((signal) => {
      const relay = (): void => server.terminate(signal);
      this.#signalSource.on(signal, relay);
      return { signal, relay };
    });

    try {
      const exit = await server.waitForExit();
      const code = exitCodeFor(exit);
      await logThought(`[ProductionHandoff] Production server exited with code ${code}.`);
      return code;
    } finally {
      for (const { signal, relay } of relays) {
        this.#signalSource.off(signal, relay);
      }
    }
  }
}
