#!/usr/bin/env node
import { printHelp, printVersion } from './cli/help.js';
import { handleInteractiveCommand, printInteractiveHelp } from './cli/interactive-command.js';
import { handleListCommand, printListHelp } from './cli/list-command.js';
import { handlePathCommand, printPathHelp } from './cli/path-command.js';
import { CliUsageError } from './cli/errors.js';
import { extractBooleanFlags } from './cli/flag-utils.js';

const VERSION = '0.1.0';

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Global help/version only count before any command.
  const firstArg = args[0];
  if (firstArg === '--help' || firstArg === '-h') {
    printHelp();
    return;
  }
  if (firstArg === '--version' || firstArg === '-v') {
    printVersion(VERSION);
    return;
  }

  // No command, or only flags: open the list.
  const command = firstArg === undefined || firstArg.startsWith('-') ? 'interactive' : args.shift();

  const helpFlags = extractBooleanFlags(args, ['--help', '-h']);
  const showHelp = helpFlags.has('--help') || helpFlags.has('-h');

  try {
    switch (command) {
      case 'help':
        printHelp();
        break;

      case 'interactive':
      case 'i':
        if (showHelp) {
          printInteractiveHelp();
        } else {
          await handleInteractiveCommand(args);
        }
        break;

      case 'list':
        if (showHelp) {
          printListHelp();
        } else {
          handleListCommand(args);
        }
        break;

      case 'path':
        if (showHelp) {
          printPathHelp();
        } else {
          handlePathCommand(args);
        }
        break;

      default:
        printHelp(`Unknown command '${command}'.`);
        process.exit(1);
    }
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
