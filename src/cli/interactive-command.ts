/**
 * termdo interactive - Full-screen todo list and editor
 */

import { readTodos, writeTodos } from '../store/todo-store.js';
import { runInteractiveTui } from '../tui/interactive.js';
import { parseCommonFlags } from './common-options.js';
import { CliUsageError } from './errors.js';

export async function handleInteractiveCommand(args: string[]): Promise<void> {
  const { config, dataFile } = parseCommonFlags(args);
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected argument '${args[0]}'. Usage: termdo interactive [options]`);
  }

  const items = readTodos(dataFile);
  await runInteractiveTui({
    items,
    config,
    save: (next) => writeTodos(dataFile, next),
  });
}

export function printInteractiveHelp(): void {
  console.log(`Usage: termdo [interactive] [options]

Launch the full-screen todo list. Changes are saved as you make them.

List keys:
  j/k, Down/Up      Move selection
  g/G               First / last item
  x, Space          Toggle done
  a                 Add a todo
  e, Enter          Edit the selected todo
  d                 Delete the selected todo
  q, Esc, Ctrl+C    Quit

Editor keys:
  i / A             Insert / append (normal mode)
  Esc               Back to normal mode
  Tab               Switch between todo and details
  Enter, s          Save (normal mode)
  q                 Discard changes (normal mode)

Options:
  --data, -d <path>     Todo data file
  --config, -c <path>   Path to config file
  -h, --help            Show help
`);
}
