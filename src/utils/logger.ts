import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

const DEFAULT_LOG_DIR = 'logs';
const REDACTED = '[REDACTED]';
const MIN_SECRET_VALUE_LENGTH = 6;
const SENSITIVE_ENV_NAME_PATTERN = /(token|secret|password|passwd|api[_-]?key|access[_-]?key|private[_-]?key)/i;
const SENSITIVE_ASSIGNMENT_PATTERN =
  /\b([A-Za-z0-9_.-]*(?:token|secret|password|passwd|api[_-]?key|access[_-]?key|private[_-]?key)[A-Za-z0-9_.-]*)(\s*[=:]\s*)("[^"]*"|'[^']*'|[^\s&,;]+)/gi;

let logDirectory = process.env.SUPERVISOR_LOG_DIR?.trim() || DEFAULT_LOG_DIR;

/** Point the daily log at another directory (the supervisor config owns this). */
export function setLogDirectory(directory: string): void {
  logDirectory = directory.trim() || DEFAULT_LOG_DIR;
}

export function getDailyLogPath(date: Date = new Date()): string {
  return path.resolve(logDirectory, `${date.toISOString().slice(0, 10)}.md`);
}

function collectSensitiveValues(): string[] {
  const values = new Set<string>();
  for (const [name, value] of Object.entries(process.env)) {
    if (!value || !SENSITIVE_ENV_NAME_PATTERN.test(name)) {
      continue;
    }
    const trimmed = value.trim();
    if (trimmed.length >= MIN_SECRET_VALUE_LENGTH) {
      values.add(trimmed);
    }
  }
  // Longest first so a secret that contains another is replaced whole.
  return [...values].sort((left, right) => right.length - left.length);
}

/**
 * Redact credentials before text is written anywhere persistent.
 *
 * Two passes: literal values of sensitive environment variables, then
 * `key=value` / `key: value` pairs whose key looks like a credential.
 */
export function scrubSensitiveText(text: string): string {
  let scrubbed = text;
  for (const value of collectSensitiveValues()) {
    scrubbed = scrubbed.split(value).join(REDACTED);
  }
  return scrubbed.replace(SENSITIVE_ASSIGNMENT_PATTERN, (_match, key: string, separator: string) => {
    return `${key}${separator}${REDACTED}`;
  });
}

async function writeEntry(entry: string): Promise<void> {
  const logPath = getDailyLogPath();
  try {
    await mkdir(path.dirname(logPath), { recursive: true });
    await appendFile(logPath, entry, 'utf8');
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[Logger] Failed to write ${logPath}: ${detail}\n`);
  }
}

/** Record an operational note in today's log and echo it to stdout. */
export async function logThought(message: string): Promise<void> {
  const scrubbed = scrubSensitiveText(message);
  console.log(scrubbed);
  await writeEntry(`## Thought @ ${new Date().toISOString()}\n${scrubbed}\n\n`);
}

/** Record an external command with its (already captured) output. */
export async function logSystemCommand(command: string, output: string, exitCode: number | null): Promise<void> {
  const scrubbedCommand = scrubSensitiveText(command);
  const scrubbedOutput = scrubSensitiveText(output);
  const exitLabel = exitCode === null ? 'n/a' : String(exitCode);
  console.log(`$ ${scrubbedCommand} (exit ${exitLabel})`);
  await writeEntry(
    `## Command @ ${new Date().toISOString()} (exit ${exitLabel})\n\`\`\`\n$ ${scrubbedCommand}\n${scrubbedOutput}\n\`\`\`\n\n`,
  );
}
