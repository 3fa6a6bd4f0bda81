import terminalKit from 'terminal-kit';
import type { Config } from '../config/loader.js';
import type { TodoItem } from '../schema/index.js';
import { applyKey, createAppState, type AppState } from './app-state.js';
import { renderApp, type RenderOptions } from './render.js';
import { createTerm, type Term } from './term.js';

export interface TuiOptions {
  items: TodoItem[];
  config: Config;
  save: (items: TodoItem[]) => void;
}

export interface KeySession {
  readonly state: AppState;
  handleKey(name: string): void;
  redraw(): void;
}

/**
 * Key loop without the terminal lifecycle: applies a key, persists list
 * changes and redraws. Failures end up in the status line.
 */
export function createKeySession(term: Term, options: TuiOptions, onExit: () => void): KeySession {
  let state = createAppState(options.items);
  const renderOptions: RenderOptions = {
    wrap: options.config.wrap,
    editorSize: options.config.editor,
  };

  const handleKey = (name: string): void => {
    try {
      const outcome = applyKey(state, name);
      state = outcome.state;
      if (outcome.changed) {
        options.save(state.list.items);
      }
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      state = { ...state, message: `Error: ${msg}` };
    }

    if (state.exit) {
      onExit();
      return;
    }
    renderApp(term, state, renderOptions);
  };

  const redraw = (): void => {
    renderApp(term, state, renderOptions);
  };

  redraw();

  return {
    get state(): AppState {
      return state;
    },
    handleKey,
    redraw,
  };
}

export async function runInteractiveTui(options: TuiOptions): Promise<TodoItem[]> {
  const terminal = terminalKit.terminal;
  const term = createTerm(terminal, { colorsDisabled: options.config.colors.disable });

  let resolveExit: (() => void) | null = null;
  const exitPromise = new Promise<void>((resolve) => {
    resolveExit = resolve;
  });

  let session: KeySession | null = null;
  const onKey = (name: string): void => {
    session?.handleKey(name);
  };
  const onResize = (): void => {
    session?.redraw();
  };

  terminal.fullscreen(true);
  terminal.grabInput(true);
  process.stdout.on('resize', onResize);
  terminal.on('key', onKey);

  try {
    const active = createKeySession(term, options, () => resolveExit?.());
    session = active;
    await exitPromise;
    return active.state.list.items;
  } finally {
    terminal.removeListener('key', onKey);
    process.stdout.removeListener('resize', onResize);
    terminal.grabInput(false);
    terminal.fullscreen(false);
    term.setCursorVisible(true);
    terminal.styleReset();
  }
}
