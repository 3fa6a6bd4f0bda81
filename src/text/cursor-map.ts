import { assertAscii } from './tokenize.js';
import { logicalLineSpans, toExtent, wrapText } from './wrap.js';
import type { CursorPosition, Rect, WrapMode } from './types.js';

/**
 * Screen cell of the character at `offset` once `text` is wrapped into `rect`.
 *
 * Offsets count every character, newlines included. Offsets past the end
 * land on the last character. A newline, or a character clipped off the
 * right edge in `none` mode, sits at the end of its row. Characters cut
 * off by the height limit map to the bottom-right cell.
 */
export function cursorAt(text: string, rect: Rect, offset: number, mode: WrapMode = 'word'): CursorPosition {
  if (text.length === 0) {
    return { x: rect.x, y: rect.y };
  }
  assertAscii(text);

  const width = toExtent(rect.width);
  const height = toExtent(rect.height);
  const index = Number.isNaN(offset) ? 0 : Math.max(0, Math.min(Math.floor(offset), text.length - 1));
  const bottomRight: CursorPosition = {
    x: rect.x + Math.max(0, width - 1),
    y: rect.y + Math.max(0, height - 1),
  };
  const endOfRow = (row: number, length: number): CursorPosition => ({
    x: rect.x + Math.max(0, Math.min(length, width - 1)),
    y: rect.y + row,
  });

  let row = 0;
  let previous: CursorPosition = { x: rect.x, y: rect.y };

  for (const span of logicalLineSpans(text)) {
    if (row >= height) break;
    const rows = wrapText(text.slice(span.start, span.end), width, height - row, mode);

    if (index < span.next) {
      let column = index - span.start;
      let laidOut = 0;
      for (let i = 0; i < rows.length; i++) {
        const length = rows[i]?.length ?? 0;
        if (column < length) {
          return { x: rect.x + column, y: rect.y + row + i };
        }
        column -= length;
        laidOut += length;
      }

      const lastLength = rows[rows.length - 1]?.length;
      if (lastLength === undefined) return previous;
      // Wrapping modes lay out the whole line unless the height cut it short.
      if (mode !== 'none' && laidOut < span.end - span.start) return bottomRight;
      return endOfRow(row + rows.length - 1, lastLength);
    }

    const lastLength = rows[rows.length - 1]?.length;
    if (lastLength !== undefined) {
      previous = endOfRow(row + rows.length - 1, lastLength);
    }
    row += rows.length;
  }

  return bottomRight;
}
