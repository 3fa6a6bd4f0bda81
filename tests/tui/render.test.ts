import { describe, expect, it } from 'vitest';
import { applyKey, createAppState, type AppState } from '../../src/tui/app-state.js';
import { formatTodoRow, getScrollTop, renderApp, type RenderOptions } from '../../src/tui/render.js';
import type { TodoItem } from '../../src/schema/index.js';
import { createScreenStub } from '../helpers/screen-stub.js';

const options: RenderOptions = { wrap: 'word', editorSize: { width: 40, height: 15 } };

const items: TodoItem[] = [
  { status: 'Todo', todo: 'Buy milk', info: '' },
  { status: 'Completed', todo: 'Call mom', info: 'after 6pm' },
];

function press(state: AppState, ...keys: string[]): AppState {
  return keys.reduce((s, key) => applyKey(s, key).state, state);
}

describe('formatTodoRow', () => {
  it('marks the status with a checkbox', () => {
    expect(formatTodoRow({ status: 'Todo', todo: 'a', info: '' })).toBe('☐ a');
    expect(formatTodoRow({ status: 'Completed', todo: 'b', info: '' })).toBe('✓ b');
  });
});

describe('getScrollTop', () => {
  it('keeps the selection inside the window', () => {
    expect(getScrollTop(null, 5)).toBe(0);
    expect(getScrollTop(2, 5)).toBe(0);
    expect(getScrollTop(5, 3)).toBe(3);
    expect(getScrollTop(4, 0)).toBe(0);
  });
});

describe('renderApp', () => {
  it('draws the list inside a titled box', () => {
    const screen = createScreenStub(80, 24);
    renderApp(screen.term, createAppState(items), options);

    expect(screen.textAt(2, 2, 1)).toBe('╭');
    expect(screen.textAt(79, 23, 1)).toBe('╯');
    expect(screen.textAt(38, 2, 6)).toBe(' TODO ');
    expect(screen.styleAt(38, 2)).toBe('bold');
    expect(screen.textAt(4, 3, 10)).toBe('☐ Buy milk');
    expect(screen.styleAt(4, 3)).toBe('selected');
    expect(screen.textAt(4, 4, 10)).toBe('✓ Call mom');
    expect(screen.styleAt(4, 4)).toBe('plain');
    expect(screen.textAt(1, 24, 10)).toBe('j/k move  ');
    expect(screen.cursor().visible).toBe(false);
  });

  it('shows a hint for an empty list', () => {
    const screen = createScreenStub(80, 24);
    renderApp(screen.term, createAppState([]), options);
    expect(screen.textAt(4, 3, 13)).toBe('No todos yet.');
    expect(screen.styleAt(4, 3)).toBe('dim');
  });

  it('draws the editor and places the cursor in the focused field', () => {
    const screen = createScreenStub(80, 24);
    const state = press(createAppState(items), 'a', 'H', 'e', 'l', 'l', 'o');
    renderApp(screen.term, state, options);

    expect(screen.textAt(36, 5, 10)).toBe(' New todo ');
    expect(screen.textAt(22, 6, 5)).toBe('Hello');
    expect(screen.textAt(22, 8, 7)).toBe('Details');
    expect(screen.styleAt(22, 8)).toBe('dim');
    expect(screen.textAt(22, 19, 13)).toBe(' INSERT Mode ');
    expect(screen.cursor()).toEqual({ x: 26, y: 6, visible: true });
  });

  it('labels the editor for an existing item in normal mode', () => {
    const screen = createScreenStub(80, 24);
    const state = press(createAppState(items), 'j', 'e');
    renderApp(screen.term, state, options);

    expect(screen.textAt(35, 5, 11)).toBe(' Edit todo ');
    expect(screen.textAt(22, 6, 8)).toBe('Call mom');
    expect(screen.textAt(22, 8, 9)).toBe('after 6pm');
    expect(screen.textAt(22, 19, 13)).toBe(' NORMAL Mode ');
    expect(screen.cursor()).toEqual({ x: 22, y: 6, visible: true });
  });

  it('writes the status message on the last row', () => {
    const screen = createScreenStub(80, 24);
    const state = press(createAppState([]), 'e');
    renderApp(screen.term, state, options);
    expect(screen.textAt(1, 24, 17)).toBe('Nothing selected.');
    expect(screen.styleAt(1, 24)).toBe('red');
    expect(screen.textAt(18, 24, 3)).toBe('   ');
  });
});
