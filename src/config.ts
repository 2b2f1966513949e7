import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';
import { CONFIG_FILE, DEFAULT_CONFIG, configSchema } from './constants';
import { ConfigError, NotFoundError, errorMessage } from './errors';
import { GeneratorConfig } from './types';

function defaultConfig(): GeneratorConfig {
  const result = configSchema.validate({});
  if (result.error) {
    throw new ConfigError('<defaults>', result.error.message);
  }
  return result.value;
}

/**
 * Builds the generator configuration: the defaults, overlaid with the given
 * JSON file or, when none is given, with `vendor-config.json` from `cwd` if
 * it exists. A relative `templatesDir` resolves against the file's directory.
 */
export async function loadConfig(configPath?: string, cwd = process.cwd()): Promise<GeneratorConfig> {
  let resolved: string;
  if (configPath) {
    resolved = path.resolve(cwd, configPath);
    if (!await fs.pathExists(resolved)) {
      throw new NotFoundError(resolved, 'Configuration file');
    }
  } else {
    resolved = path.resolve(cwd, CONFIG_FILE);
    if (!await fs.pathExists(resolved)) {
      return defaultConfig();
    }
  }

  let data: unknown;
  try {
    data = await fs.readJson(resolved);
  } catch (error) {
    throw new ConfigError(resolved, errorMessage(error));
  }

  const result = configSchema.validate(data);
  if (result.error) {
    throw new ConfigError(resolved, result.error.message);
  }

  const config = result.value;
  config.templatesDir = path.resolve(path.dirname(resolved), config.templatesDir);
  console.log(chalk.green('✓'), `Configuration loaded from ${resolved}`);
  return config;
}

export async function initConfig(dir = process.cwd()): Promise<boolean> {
  const configPath = path.join(dir, CONFIG_FILE);

  if (await fs.pathExists(configPath)) {
    console.log(chalk.yellow(`${CONFIG_FILE} already exists, leaving it untouched`));
    return false;
  }

  // templatesDir is left out so that the bundled templates stay in use.
  const { templatesDir: _templatesDir, ...defaults } = DEFAULT_CONFIG;
  await fs.writeJson(configPath, defaults, { spaces: 2 });

  console.log(chalk.green('✓'), `Created ${configPath}`);
  console.log(chalk.gray('\nNext steps:'));
  console.log(chalk.gray(`1. Edit ${CONFIG_FILE} to list the libraries to vendor`));
  console.log(chalk.gray('2. Run "vendor-package create <package.xml>" to scaffold a vendor package'));
  return true;
}
