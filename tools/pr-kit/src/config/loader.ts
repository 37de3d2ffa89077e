import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ValidationError } from '../errors.js';
import { originConfigFileSchema } from './schema.js';
import type { OriginConfigFile } from './schema.js';
import { defaultConfig } from './defaults.js';

export const CONFIG_PATHS = {
  globalConfig: path.join(
    process.env.HOME || process.env.USERPROFILE || '~',
    '.config',
    'pr-origin',
    'config.yaml'
  ),
  repoConfigName: '.pr-origin.yaml',
} as const;

export interface LoadConfigOptions {
  globalConfigPath?: string;
  /** Directory holding `.pr-origin.yaml`; defaults to the working directory */
  repoPath?: string;
  /** Explicit config file, used instead of the repo config */
  configPath?: string;
}

/**
 * Merge an overriding config over a base config.
 *
 * Rules:
 * - `github` and `authoring` are MERGED key by key (override wins, unset keys are kept).
 * - `origin` from the override REPLACES the base origin entirely.
 */
export function mergeConfigs(
  base: OriginConfigFile,
  override: OriginConfigFile | null
): OriginConfigFile {
  if (!override) {
    return base;
  }

  return {
    github: { ...base.github, ...override.github },
    origin: override.origin ?? base.origin,
    authoring: { ...base.authoring, ...override.authoring },
  };
}

function readConfigFile(filePath: string): OriginConfigFile {
  const raw = fs.readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parseYaml(raw) ?? {};
  } catch (err) {
    throw new ValidationError(`Invalid YAML in ${filePath}`, { cause: err });
  }
  const result = originConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ValidationError(
      `Invalid config at ${filePath}: ${result.error.issues.map((i) => i.message).join(', ')}`
    );
  }
  return result.data;
}

/**
 * Load and merge config from the embedded defaults, the global config and the
 * repo (or explicit) config file.
 *
 * Priority: repo/explicit config > global config > embedded defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): OriginConfigFile {
  const globalPath = options.globalConfigPath ?? CONFIG_PATHS.globalConfig;
  const repoPath = options.repoPath ?? process.cwd();
  const localPath = options.configPath ?? path.join(repoPath, CONFIG_PATHS.repoConfigName);

  let merged = defaultConfig;

  if (fs.existsSync(globalPath)) {
    merged = mergeConfigs(merged, readConfigFile(globalPath));
  }

  if (fs.existsSync(localPath)) {
    merged = mergeConfigs(merged, readConfigFile(localPath));
  } else if (options.configPath !== undefined) {
    throw new ValidationError(`Config file not found: ${options.configPath}`);
  }

  return merged;
}
