/**
 * termdo path - Print where todos are stored
 */

import { parseCommonFlags } from './common-options.js';
import { CliUsageError } from './errors.js';

export function handlePathCommand(args: string[]): void {
  const { dataFile } = parseCommonFlags(args);
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected argument '${args[0]}'. Usage: termdo path [options]`);
  }
  console.log(dataFile);
}

export function printPathHelp(): void {
  console.log(`Usage: termdo path [options]

Print the path of the todo data file.

Options:
  --data, -d <path>     Todo data file
  --config, -c <path>   Path to config file
  -h, --help            Show help
`);
}
