/**
 * Default configuration values
 */

import type { Config } from './schema.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  layout: {
    metadata_root: 'src',
    static_resource_dir: 'staticresources',
    deploy_root: 'changeSetDeploy/src',
  },
  staging: {
    base_dir: null,
  },
  vcs: {
    full_snapshot_sentinel: 'FD',
    git_binary: 'git',
  },
  output: {
    verbose: false,
    log_to_file: true,
    logs_dir: '.srpack/logs',
  },
};

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'srpack.config.yaml',
  'srpack.config.yml',
  '.srpackrc.yaml',
  '.srpackrc.yml',
  '.srpackrc',
  '.srpack/config.yaml',
];

/**
 * Global config directory path
 */
export const GLOBAL_CONFIG_DIR = '.srpack';

/**
 * Config file name in .srpack directory
 */
export const CONFIG_FILE_NAME = 'config.yaml';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  METADATA_ROOT: 'SRPACK_METADATA_ROOT',
  DEPLOY_ROOT: 'SRPACK_DEPLOY_ROOT',
  STAGING_DIR: 'SRPACK_STAGING_DIR',
  FULL_SNAPSHOT_SENTINEL: 'SRPACK_FULL_SNAPSHOT_SENTINEL',
  GIT_BINARY: 'SRPACK_GIT_BINARY',
  LOG_LEVEL: 'SRPACK_LOG_LEVEL',
} as const;
