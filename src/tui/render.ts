import type { Rect, WrapMode, CursorPosition } from '../text/index.js';
import type { TodoItem } from '../schema/index.js';
import type { AppState, EditSession } from './app-state.js';
import { renderInputField } from './input-render.js';
import { getEditViewLayout, getListViewLayout, screenRect } from './layout.js';
import { stringWidth, truncateByWidth, type Term, type TermStyle } from './term.js';

export interface RenderOptions {
  wrap: WrapMode;
  editorSize: { width: number; height: number };
}

const LIST_HINT = 'j/k move  x toggle  a add  e edit  d delete  q quit';

export function formatTodoRow(item: TodoItem): string {
  return item.status === 'Completed' ? `✓ ${item.todo}` : `☐ ${item.todo}`;
}

/** First visible row so that `selected` stays inside a window of `height` rows. */
export function getScrollTop(selected: number | null, height: number): number {
  if (selected === null || height <= 0) return 0;
  return Math.max(0, selected - height + 1);
}

function writeAt(term: Term, x: number, y: number, text: string, style?: TermStyle): void {
  if (!text) return;
  term.moveTo(x, y);
  term.write(text, style);
}

function centerTitle(title: string, width: number): { offset: number; text: string } {
  const text = truncateByWidth(title, Math.max(0, width - 2));
  const offset = Math.max(1, Math.floor((width - stringWidth(text)) / 2));
  return { offset, text };
}

export function drawRoundedBox(term: Term, rect: Rect, title?: string): void {
  if (rect.width < 2 || rect.height < 2) return;
  const inner = rect.width - 2;
  const bottom = rect.y + rect.height - 1;

  writeAt(term, rect.x, rect.y, `╭${'─'.repeat(inner)}╮`);
  for (let y = rect.y + 1; y < bottom; y++) {
    writeAt(term, rect.x, y, '│');
    writeAt(term, rect.x + rect.width - 1, y, '│');
  }
  writeAt(term, rect.x, bottom, `╰${'─'.repeat(inner)}╯`);

  if (title) {
    const { offset, text } = centerTitle(title, rect.width);
    writeAt(term, rect.x + offset, rect.y, text, 'bold');
  }
}

function renderListView(term: Term, state: AppState, area: Rect): void {
  const { border, inner } = getListViewLayout(area);
  drawRoundedBox(term, border, ' TODO ');

  const { items, selected } = state.list;
  if (inner.width <= 0 || inner.height <= 0) return;

  if (items.length === 0) {
    writeAt(term, inner.x, inner.y, truncateByWidth('No todos yet. Press a to add one.', inner.width), 'dim');
  }

  const scrollTop = getScrollTop(selected, inner.height);
  for (let row = 0; row < inner.height; row++) {
    const index = scrollTop + row;
    const item = items[index];
    if (!item) break;
    const text = truncateByWidth(formatTodoRow(item), inner.width);
    if (index === selected) {
      const pad = Math.max(0, inner.width - stringWidth(text));
      writeAt(term, inner.x, inner.y + row, text + ' '.repeat(pad), 'selected');
    } else {
      writeAt(term, inner.x, inner.y + row, text);
    }
  }

  const statusRow = area.y + area.height - 1;
  if (statusRow > border.y + border.height - 1) {
    writeAt(term, area.x, statusRow, truncateByWidth(LIST_HINT, area.width), 'dim');
  }
}

function renderEditView(term: Term, session: EditSession, area: Rect, options: RenderOptions): CursorPosition | null {
  const layout = getEditViewLayout(area, options.editorSize);
  drawRoundedBox(term, layout.border);

  const title = session.target.kind === 'new' ? ' New todo ' : ' Edit todo ';
  if (layout.header.height > 0) {
    const { offset, text } = centerTitle(title, layout.border.width);
    writeAt(term, layout.border.x + offset, layout.header.y, text, 'bold');
  }

  const todo = renderInputField(term, {
    rect: layout.todoField,
    input: session.todo,
    wrap: options.wrap,
    focused: session.field === 'todo',
    placeholder: 'Todo',
  });

  if (layout.todoArea.height > layout.todoField.height) {
    const ruleRow = layout.todoArea.y + layout.todoArea.height - 1;
    writeAt(term, layout.todoArea.x, ruleRow, '─'.repeat(layout.todoArea.width), 'dim');
  }

  const info = renderInputField(term, {
    rect: layout.infoField,
    input: session.info,
    wrap: options.wrap,
    focused: session.field === 'info',
    placeholder: 'Details',
  });

  if (layout.footer.height > 0) {
    const label = session.mode === 'insert' ? ' INSERT Mode ' : ' NORMAL Mode ';
    writeAt(term, layout.footer.x, layout.footer.y, truncateByWidth(label, layout.footer.width), 'bold');
  }

  return todo.cursor ?? info.cursor;
}

/**
 * Redraws the whole screen for `state` and places the terminal cursor.
 */
export function renderApp(term: Term, state: AppState, options: RenderOptions): void {
  const area = screenRect(term.width, term.height);

  term.setCursorVisible(false);
  term.clear();

  let cursor: CursorPosition | null = null;
  if (state.screen.kind === 'list') {
    renderListView(term, state, area);
  } else {
    cursor = renderEditView(term, state.screen, area, options);
  }

  if (state.message) {
    const text = truncateByWidth(state.message, area.width);
    const pad = Math.max(0, area.width - stringWidth(text));
    writeAt(term, area.x, area.y + area.height - 1, text + ' '.repeat(pad), 'red');
  }

  if (cursor) {
    term.moveTo(cursor.x, cursor.y);
    term.setCursorVisible(true);
  }
}
