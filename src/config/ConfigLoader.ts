/**
 * Configuration file loading
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { LogSweepConfig } from '../types';
import { ConfigError, errorCode, errorMessage } from '../errors';
import { validateConfig } from './ConfigValidator';

export const DEFAULT_CONFIG_PATH = '/etc/logsweep.yaml';

export const CONFIG_TEMPLATE_PATH = path.join(__dirname, '..', '..', 'templates', 'logsweep.yaml');

/**
 * Load, parse and validate a config file
 */
export async function loadConfig(configPath: string): Promise<LogSweepConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await fs.promises.readFile(absolutePath, 'utf8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw new ConfigError(`Cannot read config file ${absolutePath}: ${errorMessage(error)}`);
  }

  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());
  return validateConfig(parsed);
}

export function parseConfigContent(content: string, ext: string): unknown {
  if (ext === '.yaml' || ext === '.yml') {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === '.json') {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext || '(none)'}. Use .yaml, .yml, or .json`);
}

/**
 * Write the commented template config. Never overwrites an existing file.
 */
export async function initConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<string> {
  const absolutePath = path.resolve(configPath);
  const template = await fs.promises.readFile(CONFIG_TEMPLATE_PATH, 'utf8');

  await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });

  try {
    await fs.promises.writeFile(absolutePath, template, { encoding: 'utf8', flag: 'wx' });
  } catch (error) {
    if (errorCode(error) === 'EEXIST') {
      throw new ConfigError(`Config file already exists: ${absolutePath}`);
    }
    throw new ConfigError(`Cannot write config file ${absolutePath}: ${errorMessage(error)}`);
  }

  return absolutePath;
}
