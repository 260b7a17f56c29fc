/**
 * Split a configured command string into an executable and its arguments.
 *
 * Supports single and double quotes plus backslash escapes inside double
 * quotes. No shell expansion happens: operators such as `|` or `&&` are kept
 * as literal arguments.
 */
export function parseCommand(command: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let quote: '"' | '\'' | null = null;
  let escapeNext = false;
  let quotedToken = false;

  for (const char of command) {
    if (escapeNext) {
      current += char;
      escapeNext = false;
      continue;
    }

    if (quote === '"' && char === '\\') {
      escapeNext = true;
      continue;
    }

    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === '\'') {
      quote = char;
      quotedToken = true;
      continue;
    }

    if (/\s/.test(char)) {
      if (current.length > 0 || quotedToken) {
        tokens.push(current);
        current = '';
        quotedToken = false;
      }
      continue;
    }

    current += char;
  }

  if (escapeNext || quote) {
    throw new Error('Command parsing failed: unterminated quote or escape sequence.');
  }

  if (current.length > 0 || quotedToken) {
    tokens.push(current);
  }

  return tokens;
}

export function formatCommand(executable: string, args: readonly string[]): string {
  return [executable, ...args]
    .map((part) => (part.length === 0 || /\s/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}

/** Last `count` non-empty lines of `text`. */
export function tailLines(text: string, count: number): string[] {
  if (count <= 0) {
    return [];
  }
  return text
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .slice(-count);
}
