export type CommandStatus = 'ok' | 'failed' | 'timeout';

/** Outcome of one blocking external command. */
export interface CommandResult {
  status: CommandStatus;
  /** `null` when the process never produced an exit code (timeout, spawn failure). */
  exitCode: number | null;
  output: string;
  durationMs: number;
  command: string;
}

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
}

export type CommandRunner = (
  executable: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

export type ProcessStdio = 'capture' | 'inherit';

export interface ProcessSpec {
  command: string;
  args: readonly string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** `capture` buffers output (and tees it to `logPath`); `inherit` shares the supervisor's terminal. */
  stdio: ProcessStdio;
  logPath?: string;
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/** A child process as seen by the supervisor. */
export interface ManagedProcess {
  readonly pid: number | undefined;
  isAlive(): boolean;
  exitStatus(): ProcessExit | null;
  terminate(signal?: NodeJS.Signals): void;
  /**
   * Resolve with the exit status once the process has exited, or `null` when
   * `timeoutMs` elapses first. Without a timeout this waits indefinitely.
   */
  waitForExit(timeoutMs?: number): Promise<ProcessExit | null>;
  outputTail(lines: number): string[];
}

export interface ProcessSupervisor {
  spawn(spec: ProcessSpec): ManagedProcess;
}

export interface Clock {
  /** Milliseconds on a monotonic-enough timeline. */
  now(): number;
  /** Resolves after `ms`; rejects with the abort reason when `signal` fires first. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export interface HealthProbeResult {
  ok: boolean;
  detail: string;
  statusCode?: number;
}

export type HealthProbe = (url: string, timeoutMs: number) => Promise<HealthProbeResult>;
