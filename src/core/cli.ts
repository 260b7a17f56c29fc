import { resolveSupervisorConfig, validateSupervisorConfig, type SupervisorConfig } from '../config/supervisor-config.js';
import { CONFIG_SCHEMA } from '../config/env-schema.js';
import type { HistoryRecord } from '../types/update-cycle.js';
import { scrubSensitiveText, setLogDirectory } from '../utils/logger.js';
import { createHistoryLog, createStateStore } from './supervisor-factory.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: service-upgrade-supervisor [command] [options] [-- <server args>]

Commands:
  run                 Run a pending update cycle, sync artifacts, then start the server (default)
  request-update      Ask the next supervisor start to upgrade the service
  history             Print the update history log
  config              Print the resolved configuration and validation issues
  logs                Print today's operational log

Options:
  --help, -h          Show this help message
  --json              Machine-readable output (history, config)
  --limit N           Only the N most recent history records (history)
  --source NAME       Who requested the update (request-update, default "cli")
  --follow, -f        Keep printing new log entries (logs)

Arguments after "--" (or any leading flag the supervisor does not know) are
passed unchanged to the server command.

Examples:
  service-upgrade-supervisor
  service-upgrade-supervisor -- --workers 2
  service-upgrade-supervisor request-update --source deploy-bot
  service-upgrade-supervisor history --limit 10
  service-upgrade-supervisor config --json
`.trim();

const KNOWN_COMMANDS = new Set(['run', 'request-update', 'history', 'config', 'logs', '--help', '-h', '--']);

export interface CliContext {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function loadConfig(context: CliContext): SupervisorConfig {
  const config = resolveSupervisorConfig(context.env ?? process.env, { workspaceRoot: context.cwd });
  setLogDirectory(config.logDir);
  return config;
}

function readFlagValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index === -1) {
    return undefined;
  }
  return argv[index + 1];
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags appearing before any `--` separator.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  const separator = argv.indexOf('--');
  const own = separator === -1 ? argv : argv.slice(0, separator);
  if (!own.includes('--help') && !own.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Flags fall through: they belong to the server command.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  if (argv.length === 0) return false;

  const command = argv[0];
  if (KNOWN_COMMANDS.has(command) || command.startsWith('-')) {
    return false;
  }

  console.error(`[Supervisor] Unknown command: '${command}'`);
  console.error(`Run 'service-upgrade-supervisor --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}

/**
 * Arguments forwarded to the server when the supervisor runs, or `null` when
 * `argv` names another command.
 */
export function parseRunArguments(argv: string[]): string[] | null {
  if (argv.length === 0) {
    return [];
  }
  const [first, ...rest] = argv;
  if (first === 'run') {
    return rest[0] === '--' ? rest.slice(1) : rest;
  }
  if (first === '--') {
    return rest;
  }
  if (first.startsWith('-') && first !== '--help' && first !== '-h') {
    return argv;
  }
  return null;
}

/** Handle `request-update [--source NAME]`. */
export async function handleRequestUpdateCli(argv: string[], context: CliContext = {}): Promise<boolean> {
  if (argv[0] !== 'request-update') return false;

  const source = readFlagValue(argv, '--source')?.trim() || 'cli';
  try {
    const config = loadConfig(context);
    const stateStore = createStateStore(config);
    const before = await stateStore.read();
    const after = await stateStore.request(source);

    if (before.status === 'pending') {
      const since = before.request.requestedAt ?? 'an unknown time';
      console.log(`An update request is already pending (since ${since}).`);
    } else {
      await createHistoryLog(config).append('info', `Update requested by ${source}`);
      const requestedAt = after.status === 'pending' ? after.request.requestedAt : null;
      console.log(`Update requested at ${requestedAt ?? 'now'}. The next supervisor start will run the update cycle.`);
    }
    process.exitCode = 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Supervisor] Could not request update: ${message}`);
    process.exitCode = 1;
  }

  return true;
}

export function formatHistoryRecord(record: HistoryRecord): string {
  return `${record.timestamp} [${record.status.toUpperCase()}] ${record.message}`;
}

/** Handle `history [--json] [--limit N]`. */
export async function handleHistoryCli(argv: string[], context: CliContext = {}): Promise<boolean> {
  if (argv[0] !== 'history') return false;

  const asJson = argv.includes('--json');
  const rawLimit = readFlagValue(argv, '--limit');
  let limit: number | undefined;
  if (rawLimit !== undefined) {
    if (!/^\d+$/.test(rawLimit)) {
      console.error(`[Supervisor] --limit expects a non-negative integer, got '${rawLimit}'.`);
      process.exitCode = 1;
      return true;
    }
    limit = Number.parseInt(rawLimit, 10);
  }

  try {
    const config = loadConfig(context);
    const records = await createHistoryLog(config).read(limit);

    if (asJson) {
      console.log(JSON.stringify(records, null, 2));
    } else if (records.length === 0) {
      console.log(`No update history recorded at ${config.historyPath}.`);
    } else {
      console.log(records.map((record) => formatHistoryRecord(record)).join('\n'));
    }
    process.exitCode = 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Supervisor] Could not read update history: ${message}`);
    process.exitCode = 1;
  }

  return true;
}

/** Handle `config [--json]`. Exits 1 when any present value is unusable. */
export function handleConfigCli(argv: string[], context: CliContext = {}): boolean {
  if (argv[0] !== 'config') return false;

  const env = context.env ?? process.env;
  const config = loadConfig(context);
  const validation = validateSupervisorConfig(env);

  if (argv.includes('--json')) {
    console.log(scrubSensitiveText(JSON.stringify({ config, validation }, null, 2)));
  } else {
    const present = new Set<string>(validation.presentKeys);
    const lines = CONFIG_SCHEMA.map((spec) => {
      const origin = present.has(spec.key) ? 'env' : 'default';
      return `  ${spec.key.padEnd(26)} ${origin.padEnd(8)} ${spec.description}`;
    });
    console.log(['Configuration keys:', ...lines].join('\n'));
    console.log('');
    console.log(`Server command:  ${config.service.command.join(' ')}`);
    console.log(`Install command: ${config.install.command.join(' ')}`);
    console.log(`Health URL:      ${config.health.url}`);
    console.log(`Update marker:   ${config.markerPath}`);
    console.log(`History log:     ${config.historyPath} (last ${config.historyLimit})`);
    console.log('');
    if (validation.ok) {
      console.log('No configuration issues found.');
    } else {
      for (const issue of validation.issues) {
        console.log(`✗ [${issue.class}] ${issue.message}`);
        console.log(`  → ${issue.remediation}`);
      }
    }
  }

  process.exitCode = validation.ok ? 0 : 1;
  return true;
}
