import { InvalidArgumentError } from './errors.js';

const WHITESPACE = /\s/;

/**
 * Split a command line into argument tokens, the way a POSIX shell splits
 * words but without any expansion, redirection or globbing.
 *
 * - unquoted whitespace separates tokens
 * - `"..."` keeps whitespace; `\` escapes the next character inside it
 * - `'...'` is taken literally up to the closing quote
 * - `\` outside quotes escapes the next character
 *
 * Quoted and unquoted parts that touch form one token, and `""` yields an
 * empty token. An unterminated quote runs to the end of the input.
 */
export function parseArguments(commandLine: string | null | undefined): string[] {
  if (commandLine === null || commandLine === undefined || commandLine.length === 0) {
    throw new InvalidArgumentError('Missing command line');
  }

  const args: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < commandLine.length; i++) {
    const ch = commandLine[i];

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '\\' && i + 1 < commandLine.length) {
        current += commandLine[++i];
      } else if (ch === '"') {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }

    if (WHITESPACE.test(ch)) {
      if (inToken) {
        args.push(current);
        current = '';
        inToken = false;
      }
      continue;
    }

    inToken = true;
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '\\' && i + 1 < commandLine.length) {
      current += commandLine[++i];
    } else {
      current += ch;
    }
  }

  if (inToken) args.push(current);
  return args;
}

/**
 * Render a command for display and audit logs. Double quotes are escaped
 * with a backslash and tokens containing a space are wrapped in double
 * quotes. Every token is preceded by one space, so the result starts with
 * a space. Not meant to be parsed back.
 */
export function renderCommandLine(command: readonly string[]): string {
  let rendered = '';
  for (const token of command) {
    let escaped = '';
    let containsSpace = false;
    for (const ch of token) {
      if (ch === '"') escaped += '\\';
      else if (ch === ' ') containsSpace = true;
      escaped += ch;
    }
    rendered += containsSpace ? ` "${escaped}"` : ` ${escaped}`;
  }
  return rendered;
}
