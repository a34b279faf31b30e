/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  createDeployCommand,
  createPlanCommand,
  createConfigCommand,
  createDoctorCommand,
} from './commands/index.js';
import { printDiagnostics } from './output.js';

// Re-export
export * from './output.js';
export * from './commands/index.js';

/**
 * Package version - read from package.json
 */
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../../package.json');
export const VERSION: string = packageJson.version;

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('srpack')
    .description('Package changed Salesforce static resources into a change-set deployment directory')
    .version(VERSION)
    .option('--no-color', 'Disable colored output');

  program.addCommand(createDeployCommand());
  program.addCommand(createPlanCommand());
  program.addCommand(createConfigCommand());
  program.addCommand(createDoctorCommand());

  // Default action (no command specified) - show help
  program.action(() => {
    program.help();
  });

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    printDiagnostics(error);
    process.exit(1);
  }
}
