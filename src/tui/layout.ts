import type { Rect } from '../text/index.js';

export const DEFAULT_EDITOR_WIDTH = 40;
export const DEFAULT_EDITOR_HEIGHT = 15;
// Rendered as: text row (1) + rule under it (1)
export const TODO_AREA_HEIGHT = 2;

export function screenRect(width: number, height: number): Rect {
  return { x: 1, y: 1, width: Math.max(0, width), height: Math.max(0, height) };
}

export function insetRect(area: Rect, horizontal: number, vertical: number): Rect {
  const width = Math.max(0, area.width - horizontal * 2);
  const height = Math.max(0, area.height - vertical * 2);
  return { x: area.x + horizontal, y: area.y + vertical, width, height };
}

export function centeredRect(area: Rect, width: number, height: number): Rect {
  const w = Math.min(width, area.width);
  const h = Math.min(height, area.height);
  return {
    x: area.x + Math.floor((area.width - w) / 2),
    y: area.y + Math.floor((area.height - h) / 2),
    width: w,
    height: h,
  };
}

export interface ListViewLayout {
  border: Rect;
  inner: Rect;
}

export function getListViewLayout(area: Rect): ListViewLayout {
  const border = insetRect(area, 1, 1);
  return { border, inner: insetRect(border, 2, 1) };
}

export interface EditViewLayout {
  border: Rect;
  /** Overlaps the top border row; carries the title. */
  header: Rect;
  todoArea: Rect;
  todoField: Rect;
  infoField: Rect;
  /** Overlaps the bottom border row; carries the mode label. */
  footer: Rect;
}

export function getEditViewLayout(
  area: Rect,
  size: { width: number; height: number } = { width: DEFAULT_EDITOR_WIDTH, height: DEFAULT_EDITOR_HEIGHT }
): EditViewLayout {
  const border = centeredRect(area, size.width, size.height);
  const column = insetRect(border, 1, 0);
  const row = (y: number, height: number): Rect => ({ x: column.x, y, width: column.width, height });

  const headerHeight = Math.min(1, column.height);
  const footerHeight = Math.min(1, column.height - headerHeight);
  const todoHeight = Math.min(TODO_AREA_HEIGHT, column.height - headerHeight - footerHeight);
  const infoHeight = Math.max(0, column.height - headerHeight - footerHeight - todoHeight);

  const header = row(column.y, headerHeight);
  const todoArea = row(header.y + headerHeight, todoHeight);
  const infoField = row(todoArea.y + todoHeight, infoHeight);
  const footer = row(infoField.y + infoHeight, footerHeight);

  return {
    border,
    header,
    todoArea,
    todoField: { ...todoArea, height: Math.max(0, todoHeight - 1) },
    infoField,
    footer,
  };
}
