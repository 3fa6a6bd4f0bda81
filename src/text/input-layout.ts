import { cursorAt } from './cursor-map.js';
import { NonAsciiTextError } from './errors.js';
import { wrapText } from './wrap.js';
import type { CursorPosition, Rect, WrapMode } from './types.js';

export type InputLayoutResult =
  | { ok: true; lines: string[]; cursor: CursorPosition }
  | { ok: false; error: string };

/**
 * Rows and cursor cell for an input field, computed fresh for every frame.
 */
export function layoutInput(text: string, rect: Rect, offset: number, mode: WrapMode = 'word'): InputLayoutResult {
  try {
    const lines = wrapText(text, rect.width, rect.height, mode);
    const cursor = cursorAt(text, rect, offset, mode);
    return { ok: true, lines, cursor };
  } catch (error) {
    if (error instanceof NonAsciiTextError) {
      return { ok: false, error: error.message };
    }
    throw error;
  }
}
