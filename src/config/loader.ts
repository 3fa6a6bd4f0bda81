import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { WRAP_MODES } from '../text/index.js';
import { ConfigError } from '../cli/errors.js';

export const ConfigSchema = z.object({
  dataFile: z.string().optional(),
  wrap: z.enum(WRAP_MODES).default('word'),
  colors: z
    .object({
      disable: z.boolean().default(false),
    })
    .default({}),
  editor: z
    .object({
      width: z.number().int().min(10).default(40),
      height: z.number().int().min(6).default(15),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

const CONFIG_FILENAME = '.termdo.json';

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  return path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', '.config', 'termdo', 'config.json');
}

export function findConfigPath(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const configPath = path.join(dir, CONFIG_FILENAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

export function loadConfig(configPath?: string): Config {
  const pathToLoad = configPath ?? findConfigPath() ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    if (configPath) {
      throw new ConfigError('Config file not found', configPath);
    }
    return ConfigSchema.parse({});
  }

  try {
    const content = fs.readFileSync(pathToLoad, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return ConfigSchema.parse(parsed);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError('Invalid JSON in config file', pathToLoad);
    }
    throw error;
  }
}

/**
 * Data file precedence: `--data` flag, then `dataFile` from config (relative
 * to the config file's directory), then the platform default.
 */
export function resolveDataFile(
  config: Config,
  options: { dataFlag?: string; configPath?: string | null; defaultPath: () => string }
): string {
  if (options.dataFlag) return path.resolve(options.dataFlag);
  if (config.dataFile) {
    const base = options.configPath ? path.dirname(options.configPath) : process.cwd();
    return path.resolve(base, config.dataFile);
  }
  return options.defaultPath();
}
