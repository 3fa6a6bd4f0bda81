import { assertAscii, tokenize } from './tokenize.js';
import type { WrapMode } from './types.js';

export function toExtent(n: number): number {
  if (!Number.isFinite(n)) return n > 0 ? Number.MAX_SAFE_INTEGER : 0;
  return Math.max(0, Math.floor(n));
}

/** One logical line: `[start, end)` is its content, `next` where the following line begins. */
export interface LineSpan {
  start: number;
  end: number;
  next: number;
}

/**
 * Locates the logical lines of `text` the way editors read it: a `\r` before
 * the newline is not content and a trailing newline does not open an extra line.
 */
export function logicalLineSpans(text: string): LineSpan[] {
  const spans: LineSpan[] = [];
  let start = 0;
  while (start < text.length) {
    const newline = text.indexOf('\n', start);
    const next = newline === -1 ? text.length : newline + 1;
    let end = newline === -1 ? text.length : newline;
    if (end > start && text.charAt(end - 1) === '\r') end--;
    spans.push({ start, end, next });
    start = next;
  }
  return spans;
}

export function splitLogicalLines(text: string): string[] {
  return logicalLineSpans(text).map((span) => text.slice(span.start, span.end));
}

function wrapWords(text: string, width: number, height: number): string[] {
  const result: string[] = [];

  for (const rawLine of splitLogicalLines(text)) {
    const tokens = tokenize(rawLine);
    let lineStart: number | null = null;
    let lineEnd = 0;
    let currentLen = 0;

    for (const { start, end } of tokens) {
      const tokenLen = end - start;
      const fitsOnLine = currentLen + tokenLen <= width;

      // The last allowed row is never wrapped: it is cut at the right edge.
      if (result.length === height - 1 && !fitsOnLine) {
        const from = lineStart ?? start;
        result.push(rawLine.slice(from, Math.min(from + width, end)));
        return result;
      }

      if (tokenLen > width) {
        if (lineStart !== null) {
          result.push(rawLine.slice(lineStart, lineEnd));
          if (result.length >= height) return result;
        }
        let pos = start;
        while (end - pos > width) {
          result.push(rawLine.slice(pos, pos + width));
          if (result.length >= height) return result;
          pos += width;
        }
        // The remainder stays open so following tokens can join it.
        lineStart = pos;
        lineEnd = end;
        currentLen = end - pos;
        continue;
      }

      if (!fitsOnLine) {
        if (lineStart !== null) {
          result.push(rawLine.slice(lineStart, lineEnd));
          if (result.length >= height) return result;
        }
        lineStart = start;
        lineEnd = end;
        currentLen = tokenLen;
      } else {
        lineStart ??= start;
        lineEnd = end;
        currentLen += tokenLen;
      }
    }

    if (lineStart !== null) {
      result.push(rawLine.slice(lineStart, lineEnd));
      if (result.length >= height) return result;
    }
  }
  return result;
}

function wrapCharacters(text: string, width: number, height: number): string[] {
  const result: string[] = [];
  for (const rawLine of splitLogicalLines(text)) {
    assertAscii(rawLine);
    for (let pos = 0; pos < rawLine.length; pos += width) {
      result.push(rawLine.slice(pos, pos + width));
      if (result.length >= height) return result;
    }
  }
  return result;
}

function clipLines(text: string, width: number, height: number): string[] {
  const result: string[] = [];
  for (const rawLine of splitLogicalLines(text)) {
    assertAscii(rawLine);
    if (rawLine.length === 0) continue;
    result.push(rawLine.slice(0, width));
    if (result.length >= height) return result;
  }
  return result;
}

/**
 * Lays `text` out into at most `height` rows of at most `width` characters.
 *
 * ASCII only: throws `NonAsciiTextError` for any other character.
 */
export function wrapText(text: string, width: number, height: number, mode: WrapMode = 'word'): string[] {
  const w = toExtent(width);
  const h = toExtent(height);
  if (w === 0 || h === 0 || text.length === 0) return [];

  switch (mode) {
    case 'none':
      return clipLines(text, w, h);
    case 'character':
      return wrapCharacters(text, w, h);
    case 'word':
      return wrapWords(text, w, h);
  }
}
