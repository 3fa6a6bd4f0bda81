export type ListAction =
  | 'quit'
  | 'select-next'
  | 'select-previous'
  | 'select-first'
  | 'select-last'
  | 'toggle-status'
  | 'add'
  | 'edit'
  | 'delete';

export type NormalModeAction =
  | 'insert'
  | 'append'
  | 'switch-field'
  | 'cursor-left'
  | 'cursor-right'
  | 'cursor-start'
  | 'cursor-end'
  | 'delete-char'
  | 'save'
  | 'cancel';

export type InsertModeAction = 'normal-mode' | 'switch-field' | 'submit-field';

const LIST_KEYS = new Map<string, ListAction>([
  ['q', 'quit'],
  ['ESCAPE', 'quit'],
  ['j', 'select-next'],
  ['DOWN', 'select-next'],
  ['k', 'select-previous'],
  ['UP', 'select-previous'],
  ['g', 'select-first'],
  ['HOME', 'select-first'],
  ['G', 'select-last'],
  ['END', 'select-last'],
  ['x', 'toggle-status'],
  ['SPACE', 'toggle-status'],
  [' ', 'toggle-status'],
  ['a', 'add'],
  ['e', 'edit'],
  ['ENTER', 'edit'],
  ['d', 'delete'],
  ['DELETE', 'delete'],
]);

const NORMAL_MODE_KEYS = new Map<string, NormalModeAction>([
  ['i', 'insert'],
  ['A', 'append'],
  ['TAB', 'switch-field'],
  ['j', 'switch-field'],
  ['k', 'switch-field'],
  ['DOWN', 'switch-field'],
  ['UP', 'switch-field'],
  ['h', 'cursor-left'],
  ['LEFT', 'cursor-left'],
  ['l', 'cursor-right'],
  ['RIGHT', 'cursor-right'],
  ['0', 'cursor-start'],
  ['HOME', 'cursor-start'],
  ['$', 'cursor-end'],
  ['END', 'cursor-end'],
  ['x', 'delete-char'],
  ['ENTER', 'save'],
  ['s', 'save'],
  ['q', 'cancel'],
  ['ESCAPE', 'cancel'],
]);

// Everything else typed in insert mode goes to the focused field.
const INSERT_MODE_KEYS = new Map<string, InsertModeAction>([
  ['ESCAPE', 'normal-mode'],
  ['TAB', 'switch-field'],
  ['ENTER', 'submit-field'],
]);

export function resolveListKey(name: string): ListAction | null {
  return LIST_KEYS.get(name) ?? null;
}

export function resolveNormalModeKey(name: string): NormalModeAction | null {
  return NORMAL_MODE_KEYS.get(name) ?? null;
}

export function resolveInsertModeKey(name: string): InsertModeAction | null {
  return INSERT_MODE_KEYS.get(name) ?? null;
}

/** CTRL_C leaves the app from any screen without saving an open draft. */
export function isForceQuitKey(name: string): boolean {
  return name === 'CTRL_C';
}
