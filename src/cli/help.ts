import { boldText, dimText, supportsAnsiColor } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsAnsiColor
    ? `${boldText('termdo')} ${dimText('- terminal todo list')}`
    : 'termdo - terminal todo list';

  const lines = [
    title,
    '',
    'Usage: termdo [command] [options]',
    '',
    formatSection('Commands', [
      ['interactive (i)', 'Full-screen todo list and editor (default)'],
      ['list', 'Print todos'],
      ['path', 'Print the todo data file path'],
      ['help', 'Show this help'],
    ]),
    '',
    formatSection('Global flags', [
      ['--data, -d <path>', 'Todo data file'],
      ['--config, -c <path>', 'Path to config file'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Config', [
      ['Project config', 'Nearest .termdo.json (walks up from cwd)'],
      ['Global config', '~/.config/termdo/config.json'],
      ['Key fields', 'dataFile, wrap (none|character|word), colors.disable, editor.width/height'],
    ]),
    '',
    dimText('Run `termdo <command> --help` for command-specific help.'),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const header = supportsAnsiColor ? boldText(title) : title;
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => {
    const paddedName = name.padEnd(maxLen);
    const renderedName = supportsAnsiColor ? boldText(paddedName) : paddedName;
    const summary = supportsAnsiColor ? dimText(desc) : desc;
    return `  ${renderedName}  ${summary}`;
  });
  return [header, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
