import type { CommandResult, CommandRunner } from '../types/process.js';
import { runCommand } from './command-runner.js';

export interface DependencyInstaller {
  /** Install or upgrade whatever the checked-out manifest declares. */
  apply(): Promise<CommandResult>;
}

export interface CommandDependencyInstallerOptions {
  workspaceRoot: string;
  /** Executable followed by its arguments, e.g. `['venv/bin/pip', 'install', '-r', 'requirements.txt']`. */
  command: readonly string[];
  timeoutMs: number;
  commandRunner?: CommandRunner;
}

export class CommandDependencyInstaller implements DependencyInstaller {
  readonly #workspaceRoot: string;
  readonly #executable: string;
  readonly #args: readonly string[];
  readonly #timeoutMs: number;
  readonly #commandRunner: CommandRunner;

  constructor(options: CommandDependencyInstallerOptions) {
    const [executable, ...args] = options.command;
    if (!executable) {
      throw new Error('Dependency install command must name an executable.');
    }
    this.#workspaceRoot = options.workspaceRoot;
    this.#executable = executable;
    this.#args = args;
    this.#timeoutMs = options.timeoutMs;
    this.#commandRunner = options.commandRunner ?? runCommand;
  }

  apply(): Promise<CommandResult> {
    return this.#commandRunner(this.#executable, this.#args, {
      cwd: this.#workspaceRoot,
      timeoutMs: this.#timeoutMs,
    });
  }
}
