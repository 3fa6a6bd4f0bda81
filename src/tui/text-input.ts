import { isPrintableAsciiKey, isSpaceKeyName } from './key-utils.js';

export interface TextInputState {
  value: string;
  /**
   * Insertion point as a character offset into `value`, `0..value.length`.
   * Values are ASCII-only, so offsets and columns coincide.
   */
  cursor: number;
}

export interface TextInputKeyResult {
  state: TextInputState;
  didChangeValue: boolean;
}

function clampCursor(value: string, cursor: number): number {
  return Math.max(0, Math.min(cursor, value.length));
}

export function createTextInput(initial: string, cursor?: number): TextInputState {
  const value = initial ?? '';
  return { value, cursor: clampCursor(value, cursor ?? value.length) };
}

export function withCursor(state: TextInputState, cursor: number): TextInputState {
  return { value: state.value, cursor: clampCursor(state.value, cursor) };
}

function insertAt(state: TextInputState, text: string): TextInputState {
  const cursor = clampCursor(state.value, state.cursor);
  const value = state.value.slice(0, cursor) + text + state.value.slice(cursor);
  return { value, cursor: cursor + text.length };
}

export function deleteRange(state: TextInputState, start: number, end: number): TextInputState {
  const from = clampCursor(state.value, start);
  const to = clampCursor(state.value, end);
  if (to <= from) return withCursor(state, state.cursor);
  return { value: state.value.slice(0, from) + state.value.slice(to), cursor: from };
}

function isWhitespaceChar(ch: string): boolean {
  return /\s/.test(ch);
}

function moveWordLeft(state: TextInputState): TextInputState {
  const value = state.value;
  let i = clampCursor(value, state.cursor);
  while (i > 0 && isWhitespaceChar(value.charAt(i - 1))) i--;
  while (i > 0 && !isWhitespaceChar(value.charAt(i - 1))) i--;
  return withCursor(state, i);
}

function moveWordRight(state: TextInputState): TextInputState {
  const value = state.value;
  let i = clampCursor(value, state.cursor);
  while (i < value.length && isWhitespaceChar(value.charAt(i))) i++;
  while (i < value.length && !isWhitespaceChar(value.charAt(i))) i++;
  return withCursor(state, i);
}

/**
 * Applies one terminal-kit key name to the input.
 *
 * Returns `null` for keys the input does not handle (submit, cancel, field
 * switching, non-ASCII characters) so callers can dispatch them.
 */
export function applyTextInputKey(state: TextInputState, name: string): TextInputKeyResult | null {
  const prevValue = state.value;
  const prevCursor = clampCursor(state.value, state.cursor);
  const normalized = { value: state.value ?? '', cursor: prevCursor };

  const finish = (next: TextInputState): TextInputKeyResult => ({
    state: next,
    didChangeValue: next.value !== prevValue,
  });

  // Cancel/submit are handled by callers.
  if (name === 'ESCAPE' || name === 'CTRL_C' || name === 'ENTER' || name === 'TAB') return null;

  // Basic movement
  if (name === 'LEFT' || name === 'CTRL_B') return finish(withCursor(normalized, prevCursor - 1));
  if (name === 'RIGHT' || name === 'CTRL_F') return finish(withCursor(normalized, prevCursor + 1));
  if (name === 'HOME' || name === 'CTRL_A') return finish(withCursor(normalized, 0));
  if (name === 'END' || name === 'CTRL_E') return finish(withCursor(normalized, normalized.value.length));

  // Word movement
  if (name === 'ALT_LEFT' || name === 'CTRL_LEFT' || name === 'ALT_B') return finish(moveWordLeft(normalized));
  if (name === 'ALT_RIGHT' || name === 'CTRL_RIGHT' || name === 'ALT_F') return finish(moveWordRight(normalized));

  // Deletion
  if (name === 'BACKSPACE') {
    if (prevCursor <= 0) return finish(normalized);
    return finish(deleteRange(normalized, prevCursor - 1, prevCursor));
  }
  if (name === 'DELETE' || name === 'CTRL_D') {
    if (prevCursor >= normalized.value.length) return finish(normalized);
    return finish(deleteRange(normalized, prevCursor, prevCursor + 1));
  }
  if (name === 'ALT_BACKSPACE' || name === 'CTRL_W') {
    const moved = moveWordLeft(normalized);
    return finish(deleteRange(normalized, moved.cursor, prevCursor));
  }
  if (name === 'CTRL_U') {
    return finish(deleteRange(normalized, 0, prevCursor));
  }
  if (name === 'CTRL_K') {
    return finish(deleteRange(normalized, prevCursor, normalized.value.length));
  }

  // Insertion
  if (isSpaceKeyName(name)) return finish(insertAt(normalized, ' '));
  if (isPrintableAsciiKey(name)) return finish(insertAt(normalized, name));

  return null;
}
