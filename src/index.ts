#!/usr/bin/env node
import 'dotenv/config';
import { resolveSupervisorConfig, validateSupervisorConfig } from './config/supervisor-config.js';
import {
    handleConfigCli,
    handleHelpCli,
    handleHistoryCli,
    handleRequestUpdateCli,
    handleUnknownCommand,
    parseRunArguments,
} from './core/cli.js';
import { handleLogsCli } from './core/logs-cli.js';
import { createSupervisor } from './core/supervisor-factory.js';
import { exitCodeFor } from './services/production-handoff.js';
import { logThought } from './utils/logger.js';

const argv = process.argv.slice(2);

// ── One-shot CLI commands (bypass the supervisor) ────────────────────────────

if (handleHelpCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 1);
}

if (await handleRequestUpdateCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (await handleHistoryCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (handleConfigCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

const handledLogs = await handleLogsCli(argv);

// ── Supervisor run ───────────────────────────────────────────────────────────

if (!handledLogs) {
    const passthroughArgs = parseRunArguments(argv) ?? [];
    const config = resolveSupervisorConfig();
    const { supervisor } = createSupervisor(config);

    const validation = validateSupervisorConfig();
    for (const issue of validation.issues) {
        await logThought(`[Config] ${issue.message} ${issue.remediation}`);
    }

    const controller = new AbortController();
    let stopSignal: NodeJS.Signals | null = null;
    const onStop = (signal: NodeJS.Signals): void => {
        stopSignal = signal;
        controller.abort();
    };
    process.once('SIGINT', onStop);
    process.once('SIGTERM', onStop);

    try {
        const exitCode = await supervisor.run(passthroughArgs, controller.signal);
        process.exitCode = exitCode ?? exitCodeFor({ code: null, signal: stopSignal });
    } finally {
        process.off('SIGINT', onStop);
        process.off('SIGTERM', onStop);
    }
}
