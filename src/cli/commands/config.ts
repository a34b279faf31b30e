/**
 * Config command
 * Inspect CLI configuration
 */

import { Command } from 'commander';
import path from 'node:path';
import { loadConfig, getConfigPath, type Config } from '../../config/index.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import {
  printHeader,
  printSection,
  printError,
  printInfo,
  printKeyValue,
} from '../output.js';

/**
 * Print every section of a configuration
 */
export function printConfig(config: Config): void {
  printConfigSection('Layout', config.layout);
  printConfigSection('Staging', config.staging);
  printConfigSection('Version Control', config.vcs);
  printConfigSection('Output', config.output);
}

/**
 * Create the config command
 */
export function createConfigCommand(): Command {
  const config = new Command('config')
    .description('Inspect CLI configuration');

  // Show current config
  config
    .command('show')
    .description('Show current configuration')
    .option('-C, --cwd <dir>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action(async (options: { cwd: string; json?: boolean }) => {
      try {
        const loadedConfig = await loadConfig(path.resolve(options.cwd));
        const configPath = getConfigPath();

        if (options.json) {
          console.log(JSON.stringify(loadedConfig, null, 2));
          return;
        }

        printHeader('Current Configuration');

        if (configPath) {
          printInfo(`Config file: ${configPath}`);
        } else {
          printInfo('Using default configuration');
        }

        printConfig(loadedConfig);
      } catch (error) {
        printError(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });

  // Show defaults
  config
    .command('defaults')
    .description('Show default configuration values')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      if (options.json) {
        console.log(JSON.stringify(DEFAULT_CONFIG, null, 2));
        return;
      }

      printHeader('Default Configuration');
      printConfig(DEFAULT_CONFIG);
    });

  return config;
}

/**
 * Print a configuration section
 */
function printConfigSection(title: string, section: Record<string, string | number | boolean | null>): void {
  printSection(title);
  for (const [key, value] of Object.entries(section)) {
    printKeyValue(key, value === null ? '(default)' : value);
  }
}
