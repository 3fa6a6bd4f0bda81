export const WRAP_MODES = ['none', 'character', 'word'] as const;

/**
 * How an input field breaks text that is wider than its rectangle.
 *
 * - `none`: one row per logical line, cut at the right edge
 * - `character`: rows break every `width` characters
 * - `word`: rows break between words; words wider than a row are split
 */
export type WrapMode = (typeof WRAP_MODES)[number];

/** Screen rectangle; `x`/`y` is the top-left cell. */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface CursorPosition {
  x: number;
  y: number;
}

/** Half-open `[start, end)` range of one whitespace or word run. */
export interface Token {
  start: number;
  end: number;
}
