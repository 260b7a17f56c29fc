import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/utils/logger.js')>()),
  logSystemCommand: vi.fn(async () => undefined),
}));

import { runCommand } from '../../src/services/command-runner.js';
import { logSystemCommand } from '../../src/utils/logger.js';

describe('runCommand', () => {
  it('returns ok with the captured output', async () => {
    const result = await runCommand(process.execPath, ['-e', 'console.log("already up to date")']);

    expect(result.status).toBe('ok');
    expect(result.exitCode).toBe(0);
    expect(result.output).toBe('already up to date');
    expect(vi.mocked(logSystemCommand)).toHaveBeenCalledWith(result.command, 'already up to date', 0);
  });

  it('returns failed with the exit code and stderr', async () => {
    const result = await runCommand(process.execPath, ['-e', 'process.stderr.write("merge conflict");process.exit(3)']);

    expect(result.status).toBe('failed');
    expect(result.exitCode).toBe(3);
    expect(result.output).toContain('merge conflict');
  });

  it('distinguishes a timeout from a failure', async () => {
    const result = await runCommand(process.execPath, ['-e', 'setTimeout(() => undefined, 10000)'], {
      timeoutMs: 200,
    });

    expect(result.status).toBe('timeout');
    expect(result.exitCode).toBeNull();
  });

  it('reports a missing executable as failed instead of throwing', async () => {
    const result = await runCommand('definitely-not-an-installed-tool', ['--version']);

    expect(result.status).toBe('failed');
    expect(result.exitCode).toBeNull();
    expect(result.output).toContain('ENOENT');
  });
});
