import type { TodoItem } from '../schema/index.js';
import {
  addItem,
  createTodoList,
  deleteSelected,
  getSelectedItem,
  selectFirst,
  selectLast,
  selectNext,
  selectPrevious,
  toggleSelected,
  updateItem,
  type TodoListState,
} from '../todo/todo-list.js';
import {
  isForceQuitKey,
  resolveInsertModeKey,
  resolveListKey,
  resolveNormalModeKey,
  type ListAction,
  type NormalModeAction,
} from './key-policy.js';
import { applyTextInputKey, createTextInput, deleteRange, withCursor, type TextInputState } from './text-input.js';

export type EditorMode = 'normal' | 'insert';
export type EditField = 'todo' | 'info';

export type EditTarget = { kind: 'new' } | { kind: 'existing'; index: number };

/**
 * An open editor. The editor mode lives here, so a mode cannot exist
 * without an edit session.
 */
export interface EditSession {
  kind: 'edit';
  target: EditTarget;
  mode: EditorMode;
  field: EditField;
  todo: TextInputState;
  info: TextInputState;
}

export type Screen = { kind: 'list' } | EditSession;

export interface AppState {
  list: TodoListState;
  screen: Screen;
  exit: boolean;
  message: string | null;
}

export interface KeyOutcome {
  state: AppState;
  /** True when the item list changed and should be persisted. */
  changed: boolean;
}

const LIST_SCREEN: Screen = { kind: 'list' };

export function createAppState(items: TodoItem[]): AppState {
  return { list: createTodoList(items), screen: LIST_SCREEN, exit: false, message: null };
}

export function openNewItemEditor(): EditSession {
  return {
    kind: 'edit',
    target: { kind: 'new' },
    mode: 'insert',
    field: 'todo',
    todo: createTextInput(''),
    info: createTextInput(''),
  };
}

export function openItemEditor(index: number, item: TodoItem): EditSession {
  return {
    kind: 'edit',
    target: { kind: 'existing', index },
    mode: 'normal',
    field: 'todo',
    todo: createTextInput(item.todo, 0),
    info: createTextInput(item.info, 0),
  };
}

export function getFocusedInput(session: EditSession): TextInputState {
  return session.field === 'todo' ? session.todo : session.info;
}

function withFocusedInput(session: EditSession, input: TextInputState): EditSession {
  return session.field === 'todo' ? { ...session, todo: input } : { ...session, info: input };
}

function otherField(field: EditField): EditField {
  return field === 'todo' ? 'info' : 'todo';
}

function applyListAction(state: AppState, action: ListAction): KeyOutcome {
  const list = state.list;
  switch (action) {
    case 'quit':
      return { state: { ...state, exit: true }, changed: false };
    case 'select-next':
      return { state: { ...state, list: selectNext(list) }, changed: false };
    case 'select-previous':
      return { state: { ...state, list: selectPrevious(list) }, changed: false };
    case 'select-first':
      return { state: { ...state, list: selectFirst(list) }, changed: false };
    case 'select-last':
      return { state: { ...state, list: selectLast(list) }, changed: false };
    case 'toggle-status': {
      const next = toggleSelected(list);
      return { state: { ...state, list: next }, changed: next !== list };
    }
    case 'delete': {
      const next = deleteSelected(list);
      return { state: { ...state, list: next }, changed: next !== list };
    }
    case 'add':
      return { state: { ...state, screen: openNewItemEditor() }, changed: false };
    case 'edit': {
      const item = getSelectedItem(list);
      if (list.selected === null || !item) {
        return { state: { ...state, message: 'Nothing selected.' }, changed: false };
      }
      return { state: { ...state, screen: openItemEditor(list.selected, item) }, changed: false };
    }
  }
}

function saveSession(state: AppState, session: EditSession): KeyOutcome {
  const todo = session.todo.value.trim();
  if (!todo) {
    return { state: { ...state, message: 'Todo text cannot be empty.' }, changed: false };
  }

  const info = session.info.value;
  if (session.target.kind === 'new') {
    const list = addItem(state.list, { status: 'Todo', todo, info });
    return { state: { ...state, list, screen: LIST_SCREEN }, changed: true };
  }

  const existing = state.list.items[session.target.index];
  if (!existing) {
    return { state: { ...state, screen: LIST_SCREEN, message: 'Item no longer exists.' }, changed: false };
  }
  const list = updateItem(state.list, session.target.index, { ...existing, todo, info });
  return { state: { ...state, list, screen: LIST_SCREEN }, changed: true };
}

function applyNormalModeAction(state: AppState, session: EditSession, action: NormalModeAction): KeyOutcome {
  const input = getFocusedInput(session);
  const stay = (next: EditSession): KeyOutcome => ({ state: { ...state, screen: next }, changed: false });

  switch (action) {
    case 'insert':
      return stay({ ...session, mode: 'insert' });
    case 'append':
      return stay({ ...withFocusedInput(session, withCursor(input, input.value.length)), mode: 'insert' });
    case 'switch-field':
      return stay({ ...session, field: otherField(session.field) });
    case 'cursor-left':
      return stay(withFocusedInput(session, withCursor(input, input.cursor - 1)));
    case 'cursor-right':
      return stay(withFocusedInput(session, withCursor(input, input.cursor + 1)));
    case 'cursor-start':
      return stay(withFocusedInput(session, withCursor(input, 0)));
    case 'cursor-end':
      return stay(withFocusedInput(session, withCursor(input, input.value.length)));
    case 'delete-char':
      return stay(withFocusedInput(session, deleteRange(input, input.cursor, input.cursor + 1)));
    case 'save':
      return saveSession(state, session);
    case 'cancel':
      return { state: { ...state, screen: LIST_SCREEN }, changed: false };
  }
}

function applyInsertModeKey(state: AppState, session: EditSession, name: string): KeyOutcome {
  const stay = (next: EditSession): KeyOutcome => ({ state: { ...state, screen: next }, changed: false });

  const action = resolveInsertModeKey(name);
  if (action === 'normal-mode') return stay({ ...session, mode: 'normal' });
  if (action === 'switch-field') return stay({ ...session, field: otherField(session.field) });
  if (action === 'submit-field') {
    return session.field === 'todo' ? stay({ ...session, field: 'info' }) : stay({ ...session, mode: 'normal' });
  }

  const result = applyTextInputKey(getFocusedInput(session), name);
  if (!result) return { state, changed: false };
  return stay(withFocusedInput(session, result.state));
}

/**
 * Dispatches one terminal-kit key name against the current screen.
 */
export function applyKey(state: AppState, name: string): KeyOutcome {
  const current: AppState = { ...state, message: null };

  if (isForceQuitKey(name)) {
    return { state: { ...current, exit: true }, changed: false };
  }

  const screen = current.screen;
  if (screen.kind === 'list') {
    const action = resolveListKey(name);
    if (!action) return { state: current, changed: false };
    return applyListAction(current, action);
  }

  if (screen.mode === 'insert') {
    return applyInsertModeKey(current, screen, name);
  }

  const action = resolveNormalModeKey(name);
  if (!action) return { state: current, changed: false };
  return applyNormalModeAction(current, screen, action);
}
