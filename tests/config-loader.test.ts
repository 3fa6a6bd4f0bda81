import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { ConfigError } from '../src/cli/errors.js';
import { findConfigPath, loadConfig, resolveDataFile } from '../src/config/loader.js';

let originalCwd: string;
let tempDir: string;
let originalHome: string | undefined;

beforeEach(() => {
  originalCwd = process.cwd();
  originalHome = process.env.HOME;
  tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'termdo-config-')));
  process.chdir(tempDir);
  process.env.HOME = tempDir;
});

afterEach(() => {
  process.chdir(originalCwd);
  if (originalHome === undefined) delete process.env.HOME;
  else process.env.HOME = originalHome;
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function writeGlobalConfig(config: object): void {
  const dir = path.join(tempDir, '.config', 'termdo');
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, 'config.json'), JSON.stringify(config), 'utf-8');
}

describe('config loader precedence', () => {
  it('returns defaults when no config exists', () => {
    expect(loadConfig()).toEqual({
      wrap: 'word',
      colors: { disable: false },
      editor: { width: 40, height: 15 },
    });
  });

  it('falls back to global config when no local config is present', () => {
    writeGlobalConfig({ wrap: 'character' });
    expect(loadConfig().wrap).toBe('character');
  });

  it('prioritizes local project config over global config', () => {
    writeGlobalConfig({ wrap: 'character' });
    fs.writeFileSync(path.join(tempDir, '.termdo.json'), JSON.stringify({ wrap: 'none' }), 'utf-8');
    expect(loadConfig().wrap).toBe('none');
  });

  it('finds the project config from a nested directory', () => {
    fs.writeFileSync(path.join(tempDir, '.termdo.json'), '{}', 'utf-8');
    const nested = path.join(tempDir, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });
    expect(findConfigPath(nested)).toBe(path.join(tempDir, '.termdo.json'));
  });
});

describe('config errors', () => {
  it('fails on a missing explicit config', () => {
    const missing = path.join(tempDir, 'nope.json');
    expect(() => loadConfig(missing)).toThrow(ConfigError);
    expect(() => loadConfig(missing)).toThrow(`${missing}: Config file not found`);
  });

  it('fails on invalid JSON', () => {
    const file = path.join(tempDir, 'bad.json');
    fs.writeFileSync(file, '{', 'utf-8');
    expect(() => loadConfig(file)).toThrow(`${file}: Invalid JSON in config file`);
  });

  it('rejects values outside the schema', () => {
    const file = path.join(tempDir, 'small.json');
    fs.writeFileSync(file, JSON.stringify({ editor: { width: 4 } }), 'utf-8');
    expect(() => loadConfig(file)).toThrow();
  });
});

describe('resolveDataFile', () => {
  const defaultPath = (): string => '/default/todos.json';

  it('prefers the --data flag', () => {
    const config = loadConfig();
    expect(resolveDataFile({ ...config, dataFile: 'cfg.json' }, { dataFlag: 'flag.json', defaultPath })).toBe(
      path.join(tempDir, 'flag.json')
    );
  });

  it('resolves dataFile relative to the config file', () => {
    const config = { ...loadConfig(), dataFile: 'todos.json' };
    expect(resolveDataFile(config, { configPath: '/etc/termdo/config.json', defaultPath })).toBe(
      '/etc/termdo/todos.json'
    );
  });

  it('uses the platform default otherwise', () => {
    expect(resolveDataFile(loadConfig(), { configPath: null, defaultPath })).toBe('/default/todos.json');
  });
});
