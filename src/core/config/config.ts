// src/core/config/config.ts
import { readFileSync } from 'fs';
import * as path from 'path';
import * as TOML from '@iarna/toml';
import { ZodError } from 'zod';
import { AppConfigSchema, type AppConfig } from './schema.js';
import { ErrorCode, SitewatchError, errorMessage } from '../errors.js';

export const DEFAULT_CONFIG_FILE = 'sitewatch.toml';

const PATH_KEYS = [
  'manifest_path',
  'download_root',
  'index_path',
  'success_path',
  'failures_path',
  'log_path',
] as const;

export interface LoadConfigOptions {
  dryRun?: boolean;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(configPath: string = DEFAULT_CONFIG_FILE, options: LoadConfigOptions = {}): AppConfig {
  const resolvedPath = path.resolve(configPath);
  const env = options.env ?? process.env;

  let raw: string;
  try {
    raw = readFileSync(resolvedPath, 'utf-8');
  } catch (error) {
    throw new SitewatchError(
      ErrorCode.CONFIG_INVALID,
      `Cannot read config file ${resolvedPath}: ${errorMessage(error)}`,
      false,
      'Pass --config <path> or create sitewatch.toml in the working directory'
    );
  }

  let parsed: unknown;
  try {
    parsed = TOML.parse(raw);
  } catch (error) {
    throw new SitewatchError(ErrorCode.CONFIG_INVALID, `Invalid TOML in ${resolvedPath}: ${errorMessage(error)}`);
  }

  const config = parseConfig(parsed, resolvedPath);
  resolveConfigPaths(config, path.dirname(resolvedPath));

  if (options.dryRun || env.SITEWATCH_DRY_RUN === '1') {
    config.dry_run = true;
  }

  return config;
}

export function parseConfig(input: unknown, source: string = 'config'): AppConfig {
  try {
    return AppConfigSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new SitewatchError(ErrorCode.CONFIG_INVALID, `Invalid configuration in ${source}: ${issues}`);
    }
    throw error;
  }
}

/**
 * Relative paths in the config are relative to the config file's directory.
 */
export function resolveConfigPaths(config: AppConfig, baseDir: string): void {
  for (const key of PATH_KEYS) {
    const value = config[key];
    if (!value) continue;
    config[key] = path.isAbsolute(value) ? path.normalize(value) : path.resolve(baseDir, value);
  }
}
