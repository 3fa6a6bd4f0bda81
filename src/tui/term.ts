import terminalKit from 'terminal-kit';

export type TermStyle = 'plain' | 'bold' | 'dim' | 'inverse' | 'selected' | 'red';

/**
 * The slice of a terminal-kit terminal the renderers draw through.
 * Coordinates are 1-based, as in terminal-kit.
 */
export interface Term {
  readonly width: number;
  readonly height: number;
  write(text: string, style?: TermStyle): void;
  moveTo(x: number, y: number): void;
  clear(): void;
  setCursorVisible(visible: boolean): void;
}

type TerminalKitTerminal = typeof terminalKit.terminal;

export function createTerm(terminal: TerminalKitTerminal, options: { colorsDisabled: boolean }): Term {
  const write = (text: string, style: TermStyle = 'plain'): void => {
    if (options.colorsDisabled) {
      // Keep the selection visible without colors.
      if (style === 'selected' || style === 'inverse') {
        terminal.inverse(text);
        return;
      }
      terminal(text);
      return;
    }
    switch (style) {
      case 'bold':
        terminal.bold(text);
        return;
      case 'dim':
        terminal.dim(text);
        return;
      case 'inverse':
        terminal.inverse(text);
        return;
      case 'selected':
        terminal.bold.bgGray(text);
        return;
      case 'red':
        terminal.red(text);
        return;
      case 'plain':
        terminal(text);
        return;
    }
  };

  return {
    get width(): number {
      return terminal.width || process.stdout.columns || 80;
    },
    get height(): number {
      return terminal.height || process.stdout.rows || 24;
    },
    write,
    moveTo: (x, y) => {
      terminal.moveTo(x, y);
    },
    clear: () => {
      terminal.clear();
    },
    setCursorVisible: (visible) => {
      terminal.hideCursor(!visible);
    },
  };
}

export function stringWidth(text: string): number {
  return terminalKit.stringWidth(text);
}

/** Cuts `text` so it occupies at most `maxWidth` terminal columns. */
export function truncateByWidth(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  if (stringWidth(text) <= maxWidth) return text;

  let width = 0;
  const out: string[] = [];
  for (const ch of Array.from(text)) {
    const w = stringWidth(ch);
    if (width + w > maxWidth) break;
    out.push(ch);
    width += w;
  }
  return out.join('');
}
