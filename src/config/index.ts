/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { homedir } from 'node:os';
import { ConfigSchema, type Config } from './schema.js';
import {
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  GLOBAL_CONFIG_DIR,
  CONFIG_FILE_NAME,
  ENV_VARS,
} from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

type ConfigRecord = Record<string, unknown>;

/**
 * Cached config path from last search
 */
let cachedConfigPath: string | null = null;

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('srpack', {
  searchPlaces: CONFIG_FILE_NAMES,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

function isPlainObject(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load global configuration from ~/.srpack/config.yaml
 */
async function loadGlobalConfig(): Promise<ConfigRecord> {
  const globalConfigPath = path.join(homedir(), GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME);

  try {
    const content = await fs.readFile(globalConfigPath, 'utf-8');
    const parsed: unknown = parseYaml(content);
    return isPlainObject(parsed) ? parsed : {};
  } catch {
    // Global config doesn't exist, return empty
    return {};
  }
}

/**
 * Load project-specific configuration
 */
async function loadProjectConfig(cwd?: string): Promise<ConfigRecord> {
  try {
    const result = await explorer.search(cwd);
    if (result && !result.isEmpty) {
      cachedConfigPath = result.filepath;
      const config: unknown = result.config;
      return isPlainObject(config) ? config : {};
    }
  } catch {
    // Project config doesn't exist or is invalid
  }
  cachedConfigPath = null;
  return {};
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const layout: ConfigRecord = {};
  const staging: ConfigRecord = {};
  const vcs: ConfigRecord = {};
  const output: ConfigRecord = {};

  const metadataRoot = env[ENV_VARS.METADATA_ROOT];
  if (metadataRoot) {
    layout.metadata_root = metadataRoot;
  }

  const deployRoot = env[ENV_VARS.DEPLOY_ROOT];
  if (deployRoot) {
    layout.deploy_root = deployRoot;
  }

  const stagingDir = env[ENV_VARS.STAGING_DIR];
  if (stagingDir) {
    staging.base_dir = stagingDir;
  }

  const sentinel = env[ENV_VARS.FULL_SNAPSHOT_SENTINEL];
  if (sentinel) {
    vcs.full_snapshot_sentinel = sentinel;
  }

  const gitBinary = env[ENV_VARS.GIT_BINARY];
  if (gitBinary) {
    vcs.git_binary = gitBinary;
  }

  // Verbose/log level
  if (env[ENV_VARS.LOG_LEVEL] === 'debug') {
    output.verbose = true;
  }

  const config: ConfigRecord = {};
  for (const [section, values] of Object.entries({ layout, staging, vcs, output })) {
    if (Object.keys(values).length > 0) {
      config[section] = values;
    }
  }
  return config;
}

/**
 * Deep merge configuration objects
 */
export function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > project config > global config > defaults
 */
export async function loadConfig(cwd?: string): Promise<Config> {
  const globalConfig = await loadGlobalConfig();
  const projectConfig = await loadProjectConfig(cwd);
  const envConfig = loadEnvConfig();

  let merged = deepMerge(DEFAULT_CONFIG, globalConfig);
  merged = deepMerge(merged, projectConfig);
  merged = deepMerge(merged, envConfig);

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    console.warn('Configuration validation warnings:', result.error.format());
    return DEFAULT_CONFIG;
  }

  return result.data;
}

/**
 * Get the path to the currently loaded config file (or null if using defaults)
 */
export function getConfigPath(): string | null {
  return cachedConfigPath;
}
