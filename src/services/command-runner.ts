import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { CommandOptions, CommandResult, CommandRunner } from '../types/process.js';
import { formatCommand } from '../utils/command-line.js';
import { logSystemCommand, scrubSensitiveText } from '../utils/logger.js';

const execFileAsync = promisify(execFile);
const DEFAULT_TIMEOUT_MS = 120_000;
const MAX_OUTPUT_LENGTH = 8_000;
const MAX_BUFFER_BYTES = 10 * 1024 * 1024;

interface ExecError extends Error {
  code?: number | string;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
  stdout?: string;
  stderr?: string;
}

function isExecError(error: unknown): error is ExecError {
  return error instanceof Error;
}

function truncateOutput(output: string): string {
  if (output.length <= MAX_OUTPUT_LENGTH) {
    return output;
  }
  // Keep the end: that is where tools print the reason they failed.
  return `...[truncated]\n${output.slice(-MAX_OUTPUT_LENGTH)}`;
}

function resolveTimeout(timeoutMs?: number): number {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs < 1) {
    return DEFAULT_TIMEOUT_MS;
  }
  return Math.floor(timeoutMs);
}

/**
 * Run an external tool without a shell, bounded by a timeout.
 *
 * Never rejects: failures and timeouts come back as a `CommandResult`.
 */
export const runCommand: CommandRunner = async (
  executable: string,
  args: readonly string[],
  options: CommandOptions = {},
): Promise<CommandResult> => {
  const command = formatCommand(executable, args);
  const timeout = resolveTimeout(options.timeoutMs);
  const startedAt = Date.now();

  try {
    const { stdout, stderr } = await execFileAsync(executable, [...args], {
      cwd: options.cwd,
      timeout,
      killSignal: 'SIGTERM',
      windowsHide: true,
      maxBuffer: MAX_BUFFER_BYTES,
    });
    const output = truncateOutput(scrubSensitiveText([stdout, stderr].filter(Boolean).join('\n').trim()));
    await logSystemCommand(command, output || '(no output)', 0);
    return {
      status: 'ok',
      exitCode: 0,
      output,
      durationMs: Date.now() - startedAt,
      command,
    };
  } catch (error: unknown) {
    if (!isExecError(error)) {
      throw error;
    }
    const timedOut =
      error.killed === true && error.signal === 'SIGTERM' && error.code !== 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';
    const output = truncateOutput(
      scrubSensitiveText(
        [error.stdout, error.stderr, error.message]
          .filter((part): part is string => typeof part === 'string' && part.length > 0)
          .join('\n')
          .trim(),
      ),
    );
    const exitCode = typeof error.code === 'number' ? error.code : null;
    await logSystemCommand(command, output || '(no output)', exitCode);
    return {
      status: timedOut ? 'timeout' : 'failed',
      exitCode,
      output,
      durationMs: Date.now() - startedAt,
      command,
    };
  }
};
