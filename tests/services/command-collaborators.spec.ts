import { describe, expect, it, vi } from 'vitest';
import { RcloneBlobStore } from '../../src/services/blob-store.js';
import { CommandDependencyInstaller } from '../../src/services/dependency-installer.js';
import { GitVersionControl } from '../../src/services/version-control.js';
import type { CommandOptions, CommandResult, CommandRunner } from '../../src/types/process.js';
import { failedResult, okResult } from '../harness/scripted-collaborators.js';

function recordingRunner(result: (executable: string, args: readonly string[]) => CommandResult) {
  return vi.fn<CommandRunner>(async (executable: string, args: readonly string[], _options?: CommandOptions) =>
    result(executable, args),
  );
}

describe('GitVersionControl', () => {
  it('reads HEAD, pulls fast-forward only and resets hard, inside the workspace', async () => {
    const runner = recordingRunner((_executable, args) =>
      args.includes('rev-parse') ? okResult('git rev-parse HEAD', '3f9c2ab4e1d0\n') : okResult('git'),
    );
    const git = new GitVersionControl({ workspaceRoot: '/srv/app', timeoutMs: 120_000, commandRunner: runner });

    expect(await git.currentRevision()).toBe('3f9c2ab4e1d0');
    await git.pull();
    await git.resetTo('3f9c2ab4e1d0');

    expect(runner.mock.calls).toEqual([
      ['git', ['--no-pager', 'rev-parse', 'HEAD'], { cwd: '/srv/app', timeoutMs: 120_000 }],
      ['git', ['pull', '--ff-only'], { cwd: '/srv/app', timeoutMs: 120_000 }],
      ['git', ['reset', '--hard', '3f9c2ab4e1d0'], { cwd: '/srv/app', timeoutMs: 120_000 }],
    ]);
  });

  it('rejects when the revision cannot be read', async () => {
    const git = new GitVersionControl({
      workspaceRoot: '/srv/app',
      timeoutMs: 1000,
      commandRunner: recordingRunner(() => failedResult('git rev-parse HEAD', 'fatal: not a git repository', 128)),
    });

    await expect(git.currentRevision()).rejects.toThrow(
      'Unable to read current revision (failed): fatal: not a git repository',
    );
  });

  it('rejects output that is not a revision', async () => {
    const git = new GitVersionControl({
      workspaceRoot: '/srv/app',
      timeoutMs: 1000,
      commandRunner: recordingRunner(() => okResult('git rev-parse HEAD', 'HEAD')),
    });

    await expect(git.currentRevision()).rejects.toThrow("Unexpected revision identifier 'HEAD'.");
  });
});

describe('CommandDependencyInstaller', () => {
  it('runs the configured command in the workspace with its timeout', async () => {
    const runner = recordingRunner(() => okResult('pip'));
    const installer = new CommandDependencyInstaller({
      workspaceRoot: '/srv/app',
      command: ['venv/bin/pip', 'install', '-r', 'requirements.txt'],
      timeoutMs: 900_000,
      commandRunner: runner,
    });

    await installer.apply();

    expect(runner).toHaveBeenCalledWith('venv/bin/pip', ['install', '-r', 'requirements.txt'], {
      cwd: '/srv/app',
      timeoutMs: 900_000,
    });
  });

  it('refuses an empty command', () => {
    expect(() => new CommandDependencyInstaller({ workspaceRoot: '/srv/app', command: [], timeoutMs: 1000 })).toThrow(
      'Dependency install command must name an executable.',
    );
  });
});

describe('RcloneBlobStore', () => {
  it('copies for bootstrap pulls, syncs for mirror pulls and only ever copies on push', async () => {
    const runner = recordingRunner(() => okResult('rclone'));
    const store = new RcloneBlobStore({ remoteName: 'gdrive', timeoutMs: 600_000, commandRunner: runner });

    await store.pull('email-classifier-storage', '/srv/app/storage', 'copy');
    await store.pull('/email-classifier-model', '/srv/model/', 'mirror');
    await store.push('/srv/app/storage', 'email-classifier-storage');

    expect(runner.mock.calls.map(([executable, args]) => [executable, ...args].join(' '))).toEqual([
      'rclone copy gdrive:email-classifier-storage/ /srv/app/storage/',
      'rclone sync gdrive:email-classifier-model/ /srv/model/',
      'rclone copy /srv/app/storage/ gdrive:email-classifier-storage/',
    ]);
    expect(runner.mock.calls[0]?.[2]).toEqual({ timeoutMs: 600_000 });
  });
});
