import type { Status, TodoItem } from '../schema/index.js';

export interface TodoListState {
  items: TodoItem[];
  selected: number | null;
}

export function createTodoList(items: TodoItem[]): TodoListState {
  return { items, selected: items.length > 0 ? 0 : null };
}

function clampSelection(items: TodoItem[], index: number): number | null {
  if (items.length === 0) return null;
  return Math.max(0, Math.min(index, items.length - 1));
}

export function getSelectedItem(list: TodoListState): TodoItem | null {
  if (list.selected === null) return null;
  return list.items[list.selected] ?? null;
}

export function selectNext(list: TodoListState): TodoListState {
  const next = list.selected === null ? 0 : list.selected + 1;
  return { ...list, selected: clampSelection(list.items, next) };
}

export function selectPrevious(list: TodoListState): TodoListState {
  const prev = list.selected === null ? list.items.length - 1 : list.selected - 1;
  return { ...list, selected: clampSelection(list.items, prev) };
}

export function selectFirst(list: TodoListState): TodoListState {
  return { ...list, selected: clampSelection(list.items, 0) };
}

export function selectLast(list: TodoListState): TodoListState {
  return { ...list, selected: clampSelection(list.items, list.items.length - 1) };
}

/** Appends `item` and selects it. */
export function addItem(list: TodoListState, item: TodoItem): TodoListState {
  const items = [...list.items, item];
  return { items, selected: items.length - 1 };
}

export function updateItem(list: TodoListState, index: number, item: TodoItem): TodoListState {
  if (index < 0 || index >= list.items.length) return list;
  const items = list.items.map((existing, i) => (i === index ? item : existing));
  return { items, selected: index };
}

export function deleteSelected(list: TodoListState): TodoListState {
  if (list.selected === null || list.selected >= list.items.length) return list;
  const removed = list.selected;
  const items = list.items.filter((_, i) => i !== removed);
  return { items, selected: clampSelection(items, removed) };
}

export function toggleStatus(status: Status): Status {
  return status === 'Todo' ? 'Completed' : 'Todo';
}

export function toggleSelected(list: TodoListState): TodoListState {
  const current = getSelectedItem(list);
  if (list.selected === null || !current) return list;
  return updateItem(list, list.selected, { ...current, status: toggleStatus(current.status) });
}
