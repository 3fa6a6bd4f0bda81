export const supportsAnsiColor = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

function wrapAnsi(open: string, close: string): (text: string) => string {
  return (text: string) => (supportsAnsiColor ? `\x1b[${open}m${text}\x1b[${close}m` : text);
}

export const boldText = wrapAnsi('1', '22');
export const dimText = wrapAnsi('2', '22');
export const greenText = wrapAnsi('32', '39');
