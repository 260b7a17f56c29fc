import type { CommandResult, CommandRunner } from '../types/process.js';
import { runCommand } from './command-runner.js';

/** The slice of version control the update cycle needs. */
export interface VersionControl {
  /** Identifier of the checked-out revision. Rejects when it cannot be read. */
  currentRevision(): Promise<string>;
  pull(): Promise<CommandResult>;
  /** Discard local changes and move the working tree to `revision`. */
  resetTo(revision: string): Promise<CommandResult>;
}

export interface GitVersionControlOptions {
  workspaceRoot: string;
  gitBinary?: string;
  timeoutMs: number;
  commandRunner?: CommandRunner;
}

const REVISION_PATTERN = /^[0-9a-f]{7,64}$/i;

export class GitVersionControl implements VersionControl {
  readonly #workspaceRoot: string;
  readonly #gitBinary: string;
  readonly #timeoutMs: number;
  readonly #commandRunner: CommandRunner;

  constructor(options: GitVersionControlOptions) {
    this.#workspaceRoot = options.workspaceRoot;
    this.#gitBinary = options.gitBinary ?? 'git';
    this.#timeoutMs = options.timeoutMs;
    this.#commandRunner = options.commandRunner ?? runCommand;
  }

  async currentRevision(): Promise<string> {
    const result = await this.#git(['--no-pager', 'rev-parse', 'HEAD']);
    if (result.status !== 'ok') {
      throw new Error(`Unable to read current revision (${result.status}): ${result.output || 'no output'}`);
    }
    const revision = result.output.trim().split('\n').at(-1)?.trim() ?? '';
    if (!REVISION_PATTERN.test(revision)) {
      throw new Error(`Unexpected revision identifier '${revision}'.`);
    }
    return revision;
  }

  pull(): Promise<CommandResult> {
    return this.#git(['pull', '--ff-only']);
  }

  resetTo(revision: string): Promise<CommandResult> {
    return this.#git(['reset', '--hard', revision]);
  }

  #git(args: string[]): Promise<CommandResult> {
    return this.#commandRunner(this.#gitBinary, args, {
      cwd: this.#workspaceRoot,
      timeoutMs: this.#timeoutMs,
    });
  }
}
