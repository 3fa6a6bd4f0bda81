/**
 * termdo list - Print todos without entering the full-screen UI
 */

import type { TodoItem } from '../schema/index.js';
import { readTodos } from '../store/todo-store.js';
import { parseCommonFlags } from './common-options.js';
import { extractBooleanFlags } from './flag-utils.js';
import { CliUsageError } from './errors.js';
import { dimText, greenText } from './terminal.js';

interface ListOptions {
  dataFile: string;
  json: boolean;
  openOnly: boolean;
}

export function handleListCommand(args: string[]): void {
  const options = parseListFlags(args);
  runList(options);
}

export function printListHelp(): void {
  console.log(`Usage: termdo list [options]

Print the todo list.

Options:
  --open                Only show todos that are not done
  --json                Output as JSON
  --data, -d <path>     Todo data file
  --config, -c <path>   Path to config file
  -h, --help            Show help
`);
}

function parseListFlags(args: string[]): ListOptions {
  const boolFlags = extractBooleanFlags(args, ['--json', '--open']);
  const { dataFile } = parseCommonFlags(args);
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected argument '${args[0]}'. Usage: termdo list [options]`);
  }
  return { dataFile, json: boolFlags.has('--json'), openOnly: boolFlags.has('--open') };
}

export function formatTodoLines(items: TodoItem[], options: { openOnly: boolean }): string[] {
  const lines: string[] = [];
  items.forEach((item, index) => {
    if (options.openOnly && item.status === 'Completed') return;
    const mark = item.status === 'Completed' ? greenText('✓') : '☐';
    lines.push(`${String(index + 1).padStart(3)}. ${mark} ${item.todo}`);
    if (item.info) {
      for (const infoLine of item.info.split('\n')) {
        lines.push(`       ${dimText(infoLine)}`);
      }
    }
  });
  return lines;
}

function runList(options: ListOptions): void {
  const items = readTodos(options.dataFile);
  const shown = options.openOnly ? items.filter((item) => item.status === 'Todo') : items;

  if (options.json) {
    console.log(JSON.stringify(shown, null, 2));
    return;
  }

  if (shown.length === 0) {
    console.log(dimText('No todos.'));
    return;
  }
  console.log(formatTodoLines(items, { openOnly: options.openOnly }).join('\n'));
}
