import { spawn, type ChildProcess } from 'node:child_process';
import { createWriteStream, mkdirSync, type WriteStream } from 'node:fs';
import path from 'node:path';
import type { ManagedProcess, ProcessExit, ProcessSpec, ProcessSupervisor } from '../types/process.js';

const OUTPUT_BUFFER_LINES = 200;
/** How long an exited process's pipes may stay open (e.g. held by a grandchild). */
const OUTPUT_DRAIN_TIMEOUT_MS = 2000;

async function raceTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T | null> {
  let timer: NodeJS.Timeout | undefined;
  const timedOut = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), Math.max(0, timeoutMs));
  });
  try {
    return await Promise.race([promise, timedOut]);
  } finally {
    clearTimeout(timer);
  }
}

class NodeManagedProcess implements ManagedProcess {
  readonly #child: ChildProcess;
  readonly #lines: string[] = [];
  readonly #exited: Promise<ProcessExit>;
  readonly #drained: Promise<void>;
  #partialLine = '';
  #exit: ProcessExit | null = null;
  #logStream: WriteStream | null = null;

  constructor(spec: ProcessSpec) {
    if (spec.stdio === 'capture' && spec.logPath) {
      mkdirSync(path.dirname(spec.logPath), { recursive: true });
      this.#logStream = createWriteStream(spec.logPath, { flags: 'w' });
      this.#logStream.on('error', (error) => {
        this.#appendLine(`[supervisor] output log unavailable: ${error.message}`);
        this.#logStream = null;
      });
    }

    this.#child = spawn(spec.command, [...spec.args], {
      cwd: spec.cwd,
      env: spec.env ?? process.env,
      stdio: spec.stdio === 'inherit' ? 'inherit' : ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });

    this.#child.stdout?.on('data', (chunk: Buffer) => this.#capture(chunk));
    this.#child.stderr?.on('data', (chunk: Buffer) => this.#capture(chunk));

    let markDrained: () => void = () => undefined;
    this.#drained = new Promise<void>((resolve) => {
      markDrained = resolve;
    });

    this.#exited = new Promise<ProcessExit>((resolve) => {
      this.#child.once('exit', (code, signal) => {
        resolve(this.#markExited({ code, signal }));
      });
      this.#child.on('error', (error) => {
        this.#appendLine(`[supervisor] ${error.message}`);
        // Only a failed spawn leaves no pid; other errors (e.g. a failed kill) are informational.
        if (this.#child.pid === undefined) {
          resolve(this.#markExited({ code: null, signal: null }));
          this.#closeLog(markDrained);
        }
      });
      this.#child.once('close', () => {
        this.#flushPartialLine();
        this.#closeLog(markDrained);
      });
    });
  }

  get pid(): number | undefined {
    return this.#child.pid;
  }

  isAlive(): boolean {
    return this.#exit === null && this.#child.pid !== undefined;
  }

  exitStatus(): ProcessExit | null {
    return this.#exit;
  }

  terminate(signal: NodeJS.Signals = 'SIGTERM'): void {
    if (this.isAlive()) {
      this.#child.kill(signal);
    }
  }

  /**
   * Resolves once the process has exited and its output pipes are drained, so
   * `outputTail` includes everything it wrote. `null` when `timeoutMs` passes first.
   */
  async waitForExit(timeoutMs?: number): Promise<ProcessExit | null> {
    const exit =
      this.#exit ?? (timeoutMs === undefined ? await this.#exited : await raceTimeout(this.#exited, timeoutMs));
    if (!exit) {
      return null;
    }
    await raceTimeout(this.#drained, OUTPUT_DRAIN_TIMEOUT_MS);
    return exit;
  }

  outputTail(lines: number): string[] {
    const all = this.#partialLine ? [...this.#lines, this.#partialLine] : this.#lines;
    return lines > 0 ? all.slice(-lines) : [];
  }

  #markExited(exit: ProcessExit): ProcessExit {
    if (!this.#exit) {
      this.#exit = exit;
    }
    return this.#exit;
  }

  #closeLog(done: () => void): void {
    const stream = this.#logStream;
    this.#logStream = null;
    if (stream) {
      stream.end(() => done());
    } else {
      done();
    }
  }

  #capture(chunk: Buffer): void {
    this.#logStream?.write(chunk);
    const text = this.#partialLine + chunk.toString('utf8');
    const parts = text.split(/\r?\n/);
    this.#partialLine = parts.pop() ?? '';
    for (const line of parts) {
      this.#appendLine(line);
    }
  }

  #flushPartialLine(): void {
    if (this.#partialLine) {
      this.#appendLine(this.#partialLine);
      this.#partialLine = '';
    }
  }

  #appendLine(line: string): void {
    this.#lines.push(line);
    if (this.#lines.length > OUTPUT_BUFFER_LINES) {
      this.#lines.splice(0, this.#lines.length - OUTPUT_BUFFER_LINES);
    }
  }
}

/** Spawns real child processes. */
export class NodeProcessSupervisor implements ProcessSupervisor {
  spawn(spec: ProcessSpec): ManagedProcess {
    return new NodeManagedProcess(spec);
  }
}
