/**
 * Registry of every environment key the supervisor reads.
 *
 * Each entry declares:
 *   - `key`          The exact env variable name.
 *   - `scope`        Subsystem that consumes the key.
 *   - `kind`         How the raw value is interpreted.
 *   - `defaultValue` Used when the key is unset or blank.
 *   - `min` / `max`  Inclusive bounds for integer keys.
 *   - `description`  Human-readable purpose.
 *
 * `resolveSupervisorConfig` and `validateSupervisorConfig` both read from here,
 * so a default only ever lives in one place.
 */

export type ConfigKeyScope = 'update' | 'health' | 'process' | 'artifacts' | 'logging';

export type ConfigKeyKind = 'path' | 'string' | 'command' | 'integer' | 'boolean';

export interface ConfigKeySpec {
  key: string;
  scope: ConfigKeyScope;
  kind: ConfigKeyKind;
  /** `null` means "derived at resolve time" (venv-aware commands). */
  defaultValue: string | null;
  min?: number;
  max?: number;
  description: string;
}

export const CONFIG_SCHEMA = [
  // ── Update cycle ───────────────────────────────────────────────────────────
  {
    key: 'UPDATE_MARKER_PATH',
    scope: 'update',
    kind: 'path',
    defaultValue: '.update_request',
    description: 'File whose presence requests an upgrade on the next supervisor start.',
  },
  {
    key: 'UPDATE_HISTORY_PATH',
    scope: 'update',
    kind: 'path',
    defaultValue: 'update_history.json',
    description: 'Newline-delimited JSON audit trail of update and sync attempts.',
  },
  {
    key: 'UPDATE_HISTORY_LIMIT',
    scope: 'update',
    kind: 'integer',
    defaultValue: '50',
    min: 1,
    max: 50,
    description: 'Number of most recent history records kept after every append (at most 50).',
  },
  {
    key: 'GIT_BINARY',
    scope: 'update',
    kind: 'string',
    defaultValue: 'git',
    description: 'Version control executable.',
  },
  {
    key: 'GIT_TIMEOUT_MS',
    scope: 'update',
    kind: 'integer',
    defaultValue: '120000',
    min: 1_000,
    max: 3_600_000,
    description: 'Upper bound for each git invocation.',
  },
  {
    key: 'INSTALL_COMMAND',
    scope: 'update',
    kind: 'command',
    defaultValue: null,
    description: 'Dependency install command. Defaults to `pip install -r requirements.txt`, preferring the venv pip.',
  },
  {
    key: 'INSTALL_TIMEOUT_MS',
    scope: 'update',
    kind: 'integer',
    defaultValue: '900000',
    min: 1_000,
    max: 7_200_000,
    description: 'Upper bound for the dependency install command.',
  },
  {
    key: 'REINSTALL_ON_ROLLBACK',
    scope: 'update',
    kind: 'boolean',
    defaultValue: 'true',
    description: 'Re-run the install command against the restored manifest after a code rollback.',
  },
  // ── Service process ────────────────────────────────────────────────────────
  {
    key: 'SERVICE_COMMAND',
    scope: 'process',
    kind: 'command',
    defaultValue: null,
    description: 'Server command without host/port flags. Defaults to `uvicorn main:app`, preferring the venv binary.',
  },
  {
    key: 'SERVICE_HOST',
    scope: 'process',
    kind: 'string',
    defaultValue: '0.0.0.0',
    description: 'Interface the server binds to.',
  },
  {
    key: 'SERVICE_PORT',
    scope: 'process',
    kind: 'integer',
    defaultValue: '8000',
    min: 1,
    max: 65_535,
    description: 'Well-known port shared by the candidate and the production server.',
  },
  {
    key: 'VENV_DIR',
    scope: 'process',
    kind: 'path',
    defaultValue: 'venv',
    description: 'Virtual environment whose bin/ directory is preferred for the server and installer.',
  },
  {
    key: 'CANDIDATE_LOG_PATH',
    scope: 'process',
    kind: 'path',
    defaultValue: 'startup.log',
    description: 'Captured stdout/stderr of the candidate during verification.',
  },
  {
    key: 'CANDIDATE_STOP_TIMEOUT_MS',
    scope: 'process',
    kind: 'integer',
    defaultValue: '10000',
    min: 100,
    max: 120_000,
    description: 'Grace period after SIGTERM before the candidate is killed.',
  },
  // ── Health verification ────────────────────────────────────────────────────
  {
    key: 'HEALTH_PATH',
    scope: 'health',
    kind: 'string',
    defaultValue: '/health',
    description: 'Liveness endpoint path on the service port.',
  },
  {
    key: 'HEALTH_POLL_INTERVAL_MS',
    scope: 'health',
    kind: 'integer',
    defaultValue: '1000',
    min: 50,
    max: 60_000,
    description: 'Delay between verification attempts.',
  },
  {
    key: 'HEALTH_MAX_ATTEMPTS',
    scope: 'health',
    kind: 'integer',
    defaultValue: '30',
    min: 1,
    max: 1_000,
    description: 'Attempt ceiling before the candidate is declared unhealthy.',
  },
  {
    key: 'HEALTH_PROBE_TIMEOUT_MS',
    scope: 'health',
    kind: 'integer',
    defaultValue: '2000',
    min: 100,
    max: 60_000,
    description: 'Timeout of a single liveness request.',
  },
  {
    key: 'DIAGNOSTIC_TAIL_LINES',
    scope: 'health',
    kind: 'integer',
    defaultValue: '10',
    min: 0,
    max: 200,
    description: 'Candidate output lines quoted in a failed-verification record.',
  },
  // ── Artifacts ──────────────────────────────────────────────────────────────
  {
    key: 'RCLONE_BINARY',
    scope: 'artifacts',
    kind: 'string',
    defaultValue: 'rclone',
    description: 'Blob-store sync executable.',
  },
  {
    key: 'BLOB_TIMEOUT_MS',
    scope: 'artifacts',
    kind: 'integer',
    defaultValue: '600000',
    min: 1_000,
    max: 7_200_000,
    description: 'Upper bound for each blob-store transfer.',
  },
  {
    key: 'GDRIVE_REMOTE',
    scope: 'artifacts',
    kind: 'string',
    defaultValue: 'gdrive',
    description: 'Configured rclone remote name.',
  },
  {
    key: 'GDRIVE_MODEL_PATH',
    scope: 'artifacts',
    kind: 'string',
    defaultValue: 'email-classifier-model',
    description: 'Remote folder holding the trained model.',
  },
  {
    key: 'MODEL_DIR',
    scope: 'artifacts',
    kind: 'path',
    defaultValue: '../email_classifier_data/model',
    description: 'Local model directory, pulled from the remote on every start.',
  },
  {
    key: 'STORAGE_DIR',
    scope: 'artifacts',
    kind: 'path',
    defaultValue: 'storage',
    description: 'Local persisted application state.',
  },
  {
    key: 'GDRIVE_STORAGE_PATH',
    scope: 'artifacts',
    kind: 'string',
    defaultValue: 'email-classifier-storage',
    description: 'Remote folder backing up the storage directory.',
  },
  // ── Logging ────────────────────────────────────────────────────────────────
  {
    key: 'SUPERVISOR_LOG_DIR',
    scope: 'logging',
    kind: 'path',
    defaultValue: 'logs',
    description: 'Directory of the daily operational log (YYYY-MM-DD.md).',
  },
] as const satisfies readonly ConfigKeySpec[];

export type ConfigKey = (typeof CONFIG_SCHEMA)[number]['key'];

const SPECS_BY_KEY = new Map<string, ConfigKeySpec>(CONFIG_SCHEMA.map((spec) => [spec.key, spec]));

export function getConfigKeySpec(key: ConfigKey): ConfigKeySpec {
  const spec = SPECS_BY_KEY.get(key);
  if (!spec) {
    throw new Error(`Unknown config key '${key}'.`);
  }
  return spec;
}
