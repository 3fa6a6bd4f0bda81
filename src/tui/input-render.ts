import { layoutInput, type CursorPosition, type Rect, type WrapMode } from '../text/index.js';
import type { TextInputState } from './text-input.js';
import { truncateByWidth, type Term } from './term.js';

export interface InputFieldOptions {
  rect: Rect;
  input: TextInputState;
  wrap: WrapMode;
  focused: boolean;
  placeholder?: string;
}

export interface InputFieldRender {
  /** Where the terminal cursor belongs; `null` when unfocused or nothing could be laid out. */
  cursor: CursorPosition | null;
  error: string | null;
}

// Tabs and other control whitespace would move the terminal cursor.
function toVisibleRow(line: string): string {
  return line.replace(/[\t\v\f\r]/g, ' ');
}

export function renderInputField(term: Term, options: InputFieldOptions): InputFieldRender {
  const { rect, input, wrap, focused } = options;
  if (rect.width <= 0 || rect.height <= 0) {
    return { cursor: null, error: null };
  }

  const blank = ' '.repeat(rect.width);
  for (let row = 0; row < rect.height; row++) {
    term.moveTo(rect.x, rect.y + row);
    term.write(blank);
  }

  const layout = layoutInput(input.value, rect, input.cursor, wrap);
  if (!layout.ok) {
    term.moveTo(rect.x, rect.y);
    term.write(truncateByWidth(layout.error, rect.width), 'red');
    return { cursor: null, error: layout.error };
  }

  if (input.value.length === 0 && options.placeholder && !focused) {
    term.moveTo(rect.x, rect.y);
    term.write(truncateByWidth(options.placeholder, rect.width), 'dim');
  }

  layout.lines.forEach((line, row) => {
    term.moveTo(rect.x, rect.y + row);
    term.write(toVisibleRow(line));
  });

  return { cursor: focused ? layout.cursor : null, error: null };
}
