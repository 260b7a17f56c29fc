import { existsSync } from 'node:fs';
import path from 'node:path';
import { parseCommand } from '../utils/command-line.js';
import { CONFIG_SCHEMA, getConfigKeySpec, type ConfigKey, type ConfigKeySpec } from './env-schema.js';

const DEFAULT_SERVICE_ARGS = ['main:app', '--host', '{host}', '--port', '{port}'];
const DEFAULT_INSTALL_ARGS = ['install', '-r', 'requirements.txt'];
const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSY_VALUES = new Set(['0', 'false', 'no', 'off']);
const WILDCARD_HOSTS = new Set(['0.0.0.0', '::', '[::]', '']);

export interface SupervisorConfig {
  workspaceRoot: string;
  markerPath: string;
  historyPath: string;
  historyLimit: number;
  logDir: string;
  git: {
    binary: string;
    timeoutMs: number;
  };
  install: {
    command: string[];
    timeoutMs: number;
    reinstallOnRollback: boolean;
  };
  service: {
    /** Executable first; `{host}` / `{port}` placeholders already substituted. */
    command: string[];
    host: string;
    port: number;
  };
  candidate: {
    logPath: string;
    stopTimeoutMs: number;
  };
  health: {
    url: string;
    pollIntervalMs: number;
    maxAttempts: number;
    probeTimeoutMs: number;
    diagnosticLines: number;
  };
  artifacts: {
    rcloneBinary: string;
    timeoutMs: number;
    remoteName: string;
    remoteModelPath: string;
    modelDir: string;
    storageDir: string;
    remoteStoragePath: string;
  };
}

export interface ResolveConfigOptions {
  workspaceRoot?: string;
  fileExists?: (filePath: string) => boolean;
}

export type ConfigIssueClass = 'format_error' | 'out_of_range';

export interface ConfigIssue {
  key: ConfigKey;
  class: ConfigIssueClass;
  message: string;
  remediation: string;
}

export interface ConfigValidationResult {
  ok: boolean;
  issues: ConfigIssue[];
  /** Keys explicitly set in the environment. */
  presentKeys: ConfigKey[];
  validatedAt: string;
}

function readRaw(env: NodeJS.ProcessEnv, key: ConfigKey): string | undefined {
  const raw = env[key];
  if (typeof raw !== 'string') {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function defaultOf(spec: ConfigKeySpec): string {
  return spec.defaultValue ?? '';
}

function readString(env: NodeJS.ProcessEnv, key: ConfigKey): string {
  return readRaw(env, key) ?? defaultOf(getConfigKeySpec(key));
}

function readInteger(env: NodeJS.ProcessEnv, key: ConfigKey): number {
  const spec = getConfigKeySpec(key);
  const fallback = Number.parseInt(defaultOf(spec), 10);
  const raw = readRaw(env, key);
  const parsed = raw !== undefined && /^-?\d+$/.test(raw) ? Number.parseInt(raw, 10) : fallback;
  const min = spec.min ?? Number.MIN_SAFE_INTEGER;
  const max = spec.max ?? Number.MAX_SAFE_INTEGER;
  return Math.max(min, Math.min(max, parsed));
}

export function parseBooleanEnv(raw: string | undefined, fallback: boolean): boolean {
  if (!raw) {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (TRUTHY_VALUES.has(normalized)) {
    return true;
  }
  if (FALSY_VALUES.has(normalized)) {
    return false;
  }
  return fallback;
}

function readBoolean(env: NodeJS.ProcessEnv, key: ConfigKey): boolean {
  return parseBooleanEnv(readRaw(env, key), parseBooleanEnv(defaultOf(getConfigKeySpec(key)), false));
}

function readCommand(env: NodeJS.ProcessEnv, key: ConfigKey, fallback: string[]): string[] {
  const raw = readRaw(env, key);
  if (!raw) {
    return fallback;
  }
  try {
    const parsed = parseCommand(raw);
    return parsed.length > 0 ? parsed : fallback;
  } catch {
    return fallback;
  }
}

function resolvePath(workspaceRoot: string, value: string): string {
  return path.resolve(workspaceRoot, value);
}

/** Prefer `<venv>/bin/<tool>` when it exists, otherwise rely on PATH. */
function resolveVenvTool(venvDir: string, tool: string, fileExists: (filePath: string) => boolean): string {
  const candidate = path.join(venvDir, 'bin', tool);
  return fileExists(candidate) ? candidate : tool;
}

function substitutePlaceholders(args: string[], host: string, port: number): string[] {
  return args.map((arg) => arg.replaceAll('{host}', host).replaceAll('{port}', String(port)));
}

function normalizeHealthPath(value: string): string {
  return value.startsWith('/') ? value : `/${value}`;
}

function probeHost(host: string): string {
  if (WILDCARD_HOSTS.has(host)) {
    return '127.0.0.1';
  }
  return host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
}

export function resolveSupervisorConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: ResolveConfigOptions = {},
): SupervisorConfig {
  const workspaceRoot = path.resolve(options.workspaceRoot ?? process.cwd());
  const fileExists = options.fileExists ?? existsSync;
  const venvDir = resolvePath(workspaceRoot, readString(env, 'VENV_DIR'));

  const host = readString(env, 'SERVICE_HOST');
  const port = readInteger(env, 'SERVICE_PORT');
  const serviceCommand = substitutePlaceholders(
    readCommand(env, 'SERVICE_COMMAND', [resolveVenvTool(venvDir, 'uvicorn', fileExists), ...DEFAULT_SERVICE_ARGS]),
    host,
    port,
  );
  const installCommand = readCommand(env, 'INSTALL_COMMAND', [
    resolveVenvTool(venvDir, 'pip', fileExists),
    ...DEFAULT_INSTALL_ARGS,
  ]);

  return {
    workspaceRoot,
    markerPath: resolvePath(workspaceRoot, readString(env, 'UPDATE_MARKER_PATH')),
    historyPath: resolvePath(workspaceRoot, readString(env, 'UPDATE_HISTORY_PATH')),
    historyLimit: readInteger(env, 'UPDATE_HISTORY_LIMIT'),
    logDir: resolvePath(workspaceRoot, readString(env, 'SUPERVISOR_LOG_DIR')),
    git: {
      binary: readString(env, 'GIT_BINARY'),
      timeoutMs: readInteger(env, 'GIT_TIMEOUT_MS'),
    },
    install: {
      command: installCommand,
      timeoutMs: readInteger(env, 'INSTALL_TIMEOUT_MS'),
      reinstallOnRollback: readBoolean(env, 'REINSTALL_ON_ROLLBACK'),
    },
    service: {
      command: serviceCommand,
      host,
      port,
    },
    candidate: {
      logPath: resolvePath(workspaceRoot, readString(env, 'CANDIDATE_LOG_PATH')),
      stopTimeoutMs: readInteger(env, 'CANDIDATE_STOP_TIMEOUT_MS'),
    },
    health: {
      url: `http://${probeHost(host)}:${port}${normalizeHealthPath(readString(env, 'HEALTH_PATH'))}`,
      pollIntervalMs: readInteger(env, 'HEALTH_POLL_INTERVAL_MS'),
      maxAttempts: readInteger(env, 'HEALTH_MAX_ATTEMPTS'),
      probeTimeoutMs: readInteger(env, 'HEALTH_PROBE_TIMEOUT_MS'),
      diagnosticLines: readInteger(env, 'DIAGNOSTIC_TAIL_LINES'),
    },
    artifacts: {
      rcloneBinary: readString(env, 'RCLONE_BINARY'),
      timeoutMs: readInteger(env, 'BLOB_TIMEOUT_MS'),
      remoteName: readString(env, 'GDRIVE_REMOTE'),
      remoteModelPath: readString(env, 'GDRIVE_MODEL_PATH'),
      modelDir: resolvePath(workspaceRoot, readString(env, 'MODEL_DIR')),
      storageDir: resolvePath(workspaceRoot, readString(env, 'STORAGE_DIR')),
      remoteStoragePath: readString(env, 'GDRIVE_STORAGE_PATH'),
    },
  };
}

function validateValue(spec: ConfigKeySpec, key: ConfigKey, raw: string): ConfigIssue | null {
  switch (spec.kind) {
    case 'integer': {
      if (!/^-?\d+$/.test(raw)) {
        return {
          key,
          class: 'format_error',
          message: `${key} must be an integer, got '${raw}'.`,
          remediation: `Set ${key} to a whole number or remove it to use the default (${defaultOf(spec)}).`,
        };
      }
      const parsed = Number.parseInt(raw, 10);
      if ((spec.min !== undefined && parsed < spec.min) || (spec.max !== undefined && parsed > spec.max)) {
        return {
          key,
          class: 'out_of_range',
          message: `${key} must be between ${spec.min ?? '-∞'} and ${spec.max ?? '∞'}, got ${parsed}; the value will be clamped.`,
          remediation: `Choose a value for ${key} inside the supported range.`,
        };
      }
      return null;
    }
    case 'boolean': {
      const normalized = raw.toLowerCase();
      if (!TRUTHY_VALUES.has(normalized) && !FALSY_VALUES.has(normalized)) {
        return {
          key,
          class: 'format_error',
          message: `${key} must be a boolean (true/false, yes/no, on/off, 1/0), got '${raw}'.`,
          remediation: `Set ${key} to true or false.`,
        };
      }
      return null;
    }
    case 'command': {
      try {
        if (parseCommand(raw).length === 0) {
          throw new Error('no executable given');
        }
        return null;
      } catch (error: unknown) {
        const detail = error instanceof Error ? error.message : String(error);
        return {
          key,
          class: 'format_error',
          message: `${key} could not be parsed: ${detail}`,
          remediation: `Quote arguments containing spaces in ${key}; the default is used until then.`,
        };
      }
    }
    default:
      return null;
  }
}

/** Report values that are present but unusable. Never throws. */
export function validateSupervisorConfig(
  env: NodeJS.ProcessEnv = process.env,
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const presentKeys: ConfigKey[] = [];

  for (const spec of CONFIG_SCHEMA) {
    const raw = readRaw(env, spec.key);
    if (raw === undefined) {
      continue;
    }
    presentKeys.push(spec.key);
    const issue = validateValue(spec, spec.key, raw);
    if (issue) {
      issues.push(issue);
    }
  }

  return {
    ok: issues.length === 0,
    issues,
    presentKeys,
    validatedAt: now().toISOString(),
  };
}
