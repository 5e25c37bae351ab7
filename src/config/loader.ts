import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import yaml from 'js-yaml';
import { AffirmConfigSchema, type AffirmConfig } from '../types/config.js';
import { formatIssues } from './issues.js';

export const CONFIG_FILENAME = 'affirm.config.yaml';

/**
 * Find config file by walking up from cwd
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  while (true) {
    const configPath = resolve(dir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    const parentDir = dirname(dir);
    if (parentDir === dir) {
      return null;
    }
    dir = parentDir;
  }
}

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
}

export interface LoadConfigResult {
  config: AffirmConfig;
  /** null when no config file was found and defaults apply */
  configPath: string | null;
}

/**
 * Parse and validate config file content
 */
export function parseConfig(content: string, source = CONFIG_FILENAME): AffirmConfig {
  const raw: unknown = yaml.load(content) ?? {};

  const result = AffirmConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid config file ${source}:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load and validate project config. An explicit path must exist; without one
 * the nearest affirm.config.yaml above cwd is used, or the defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadConfigResult {
  const cwd = options.cwd ?? process.cwd();

  if (options.configPath !== undefined) {
    const configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    return {
      config: parseConfig(readFileSync(configPath, 'utf-8'), configPath),
      configPath,
    };
  }

  const configPath = findConfigFile(cwd);
  if (!configPath) {
    return { config: AffirmConfigSchema.parse({}), configPath: null };
  }

  return {
    config: parseConfig(readFileSync(configPath, 'utf-8'), configPath),
    configPath,
  };
}
