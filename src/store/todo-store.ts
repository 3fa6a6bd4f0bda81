import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { TodoFileSchema, type TodoItem } from '../schema/index.js';
import { DataFileError } from '../cli/errors.js';

const APP_DIR = 'todo';
const DATA_FILENAME = 'todos.json';

export interface PlatformEnv {
  platform: NodeJS.Platform;
  env: NodeJS.ProcessEnv;
  homeDir: string;
}

function currentPlatformEnv(): PlatformEnv {
  // Read on every call so tests that stub HOME / XDG_DATA_HOME behave correctly.
  return { platform: process.platform, env: process.env, homeDir: os.homedir() };
}

/**
 * Per-user data directory: XDG on Linux, Application Support on macOS,
 * roaming AppData on Windows.
 */
export function getDataDir(platformEnv: PlatformEnv = currentPlatformEnv()): string {
  const { platform, env } = platformEnv;
  const home = env.HOME || platformEnv.homeDir;

  if (platform === 'win32') {
    if (env.APPDATA) return env.APPDATA;
    const winHome = env.USERPROFILE || platformEnv.homeDir;
    if (!winHome) throw new DataFileError('No home directory found.', null);
    return path.win32.join(winHome, 'AppData', 'Roaming');
  }

  if (!home) throw new DataFileError('No home directory found.', null);

  if (platform === 'darwin') {
    return path.join(home, 'Library', 'Application Support');
  }

  const xdg = env.XDG_DATA_HOME;
  if (xdg && path.isAbsolute(xdg)) return xdg;
  return path.join(home, '.local', 'share');
}

export function getDefaultDataFilePath(platformEnv?: PlatformEnv): string {
  const dataDir = getDataDir(platformEnv);
  const join = platformEnv?.platform === 'win32' ? path.win32.join : path.join;
  return join(dataDir, APP_DIR, DATA_FILENAME);
}

export function readTodos(filePath: string): TodoItem[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new DataFileError('Invalid JSON in todo file', filePath);
    }
    throw error;
  }

  const parsed = TodoFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new DataFileError(`Invalid todo file${where}: ${issue?.message ?? 'unexpected shape'}`, filePath);
  }
  return parsed.data;
}

export function writeTodos(filePath: string, items: TodoItem[]): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const content = JSON.stringify(items, null, 2);
  fs.writeFileSync(filePath, content, 'utf-8');
}
