import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import path from 'node:path';
import { resolveSupervisorConfig } from '../config/supervisor-config.js';
import { getDailyLogPath, setLogDirectory } from '../utils/logger.js';
import type { CliContext } from './cli.js';

const FOLLOW_CONTEXT_BYTES = 4096;

export interface DailyLogFollowerOptions {
    /** Path of the log file for "now"; changes at the day boundary. */
    resolvePath: () => string;
    write: (text: string) => void;
}

function sizeOf(filePath: string): number {
    try {
        return fs.statSync(filePath).size;
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return 0;
        }
        throw error;
    }
}

/**
 * `tail -f` over the daily operational log. When the day rolls over, the rest
 * of the old file is printed and the follower moves to the new one.
 */
export class DailyLogFollower {
    readonly #resolvePath: () => string;
    readonly #write: (text: string) => void;
    #currentPath: string;
    #position = 0;

    constructor(options: DailyLogFollowerOptions) {
        this.#resolvePath = options.resolvePath;
        this.#write = options.write;
        this.#currentPath = options.resolvePath();
    }

    get currentPath(): string {
        return this.#currentPath;
    }

    /** Print up to `contextBytes` of what the current file already holds. */
    start(contextBytes: number): void {
        this.#position = Math.max(0, sizeOf(this.#currentPath) - contextBytes);
        this.#emitNewBytes();
    }

    /** Print whatever was appended since the last call. */
    poll(): void {
        const latest = this.#resolvePath();
        if (latest !== this.#currentPath) {
            this.#emitNewBytes();
            this.#currentPath = latest;
            this.#position = 0;
            this.#write(`\n[Supervisor Logs] Switched to ${latest}\n`);
        }
        this.#emitNewBytes();
    }

    #emitNewBytes(): void {
        const size = sizeOf(this.#currentPath);
        if (size < this.#position) {
            // Truncated.
            this.#position = 0;
        }
        if (size === this.#position) {
            return;
        }

        const buffer = Buffer.alloc(size - this.#position);
        const fd = fs.openSync(this.#currentPath, 'r');
        try {
            fs.readSync(fd, buffer, 0, buffer.length, this.#position);
        } finally {
            fs.closeSync(fd);
        }
        this.#position = size;
        this.#write(buffer.toString('utf8'));
    }
}

/**
 * Handle the `logs` command.
 * Reads or tails today's operational log.
 */
export async function handleLogsCli(argv: string[], context: CliContext = {}): Promise<boolean> {
    if (argv[0] !== 'logs') return false;

    const config = resolveSupervisorConfig(context.env ?? process.env, { workspaceRoot: context.cwd });
    setLogDirectory(config.logDir);

    const follow = argv.includes('--follow') || argv.includes('-f');
    const logPath = getDailyLogPath();

    if (!fs.existsSync(logPath)) {
        console.error(`[Supervisor Logs] No logs found for today at ${logPath}.`);
        process.exitCode = 1;
        return true;
    }

    if (follow) {
        console.log(`[Supervisor Logs] Following logs from ${logPath}...\n`);
        followDailyLog(path.dirname(logPath));
        // The watcher keeps the process alive until the operator interrupts it.
    } else {
        const contents = await fsPromises.readFile(logPath, 'utf8');
        process.stdout.write(contents);
        process.exitCode = 0;
    }

    return true;
}

function followDailyLog(logDir: string): void {
    const follower = new DailyLogFollower({
        resolvePath: () => getDailyLogPath(),
        write: (text) => {
            process.stdout.write(text);
        },
    });
    follower.start(FOLLOW_CONTEXT_BYTES);

    try {
        // The directory, not the file: tomorrow's log does not exist yet.
        fs.watch(logDir, () => {
            try {
                follower.poll();
            } catch (err) {
                console.error(`[Supervisor Logs] Failed to read ${follower.currentPath}: ${err instanceof Error ? err.message : String(err)}`);
            }
        });
    } catch (err) {
        console.error(`[Supervisor Logs] Failed to watch ${logDir}: ${err instanceof Error ? err.message : String(err)}`);
    }
}
