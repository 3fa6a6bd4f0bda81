import { NonAsciiTextError } from './errors.js';
import type { Token } from './types.js';

const ASCII_WHITESPACE = /[\t\n\v\f\r ]/;

function isWhitespaceChar(ch: string): boolean {
  return ASCII_WHITESPACE.test(ch);
}

export function assertAscii(line: string): void {
  for (let i = 0; i < line.length; i++) {
    const code = line.charCodeAt(i);
    if (code > 0x7f) {
      throw new NonAsciiTextError(i, String.fromCodePoint(line.codePointAt(i) ?? code));
    }
  }
}

/**
 * Splits one logical line into alternating whitespace / non-whitespace runs.
 *
 * Only ASCII input is supported; any other character throws `NonAsciiTextError`.
 */
export function tokenize(line: string): Token[] {
  assertAscii(line);

  const tokens: Token[] = [];
  let start = 0;
  let inWhitespace = line.length > 0 && isWhitespaceChar(line.charAt(0));

  for (let i = 0; i < line.length; i++) {
    const whitespace = isWhitespaceChar(line.charAt(i));
    if (whitespace !== inWhitespace) {
      tokens.push({ start, end: i });
      start = i;
      inWhitespace = whitespace;
    }
  }

  // Trailing run
  if (start < line.length) {
    tokens.push({ start, end: line.length });
  }
  return tokens;
}
