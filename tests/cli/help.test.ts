import { afterEach, describe, expect, it, vi } from 'vitest';
import { printHelp, printVersion } from '../../src/cli/help.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('help output', () => {
  it('lists commands on stderr', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    printHelp();

    const output = errorSpy.mock.calls.map((args) => String(args[0])).join('\n');
    expect(output).toContain('Usage: termdo [command] [options]');
    expect(output).toContain('interactive (i)');
    expect(output).toContain('.termdo.json');
  });

  it('prints a leading message first', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    printHelp('Unknown command: nope');
    expect(errorSpy.mock.calls[0]).toEqual(['Unknown command: nope']);
    expect(errorSpy.mock.calls[1]).toEqual(['']);
  });

  it('prints the version on stdout', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    printVersion('1.2.3');
    expect(logSpy).toHaveBeenCalledWith('1.2.3');
  });
});
