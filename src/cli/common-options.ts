import { loadConfig, resolveDataFile, findConfigPath, getGlobalConfigPath, type Config } from '../config/loader.js';
import { getDefaultDataFilePath } from '../store/todo-store.js';
import { extractFlags } from './flag-utils.js';

export interface CommonOptions {
  config: Config;
  configPath: string | null;
  dataFile: string;
}

/**
 * Pulls `--config/-c` and `--data/-d` out of `args` and resolves the
 * config and data file they point at.
 */
export function parseCommonFlags(args: string[]): CommonOptions {
  const valueFlags = extractFlags(args, ['--config', '-c', '--data', '-d']);
  const explicitConfig = valueFlags['--config'] ?? valueFlags['-c'];
  const config = loadConfig(explicitConfig);
  const configPath = explicitConfig ?? findConfigPath() ?? getGlobalConfigPath();

  const dataFile = resolveDataFile(config, {
    dataFlag: valueFlags['--data'] ?? valueFlags['-d'],
    configPath,
    defaultPath: () => getDefaultDataFilePath(),
  });

  return { config, configPath, dataFile };
}
