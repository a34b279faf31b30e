/**
 * CLI command: srpack deploy
 *
 * Packages the static resources changed between two revisions into the
 * change-set deployment directory.
 */

import { Command } from 'commander';
import path from 'node:path';
import { loadConfig, type Config } from '../../config/index.js';
import { runPipeline } from '../../pipeline/orchestrator.js';
import { RunLogger, runLogPath, type LogEntry } from '../../pipeline/run-logger.js';
import type { VersionControl } from '../../pipeline/vcs.js';
import type { RunReport } from '../../types/run.js';
import {
  failSpinner,
  printDiagnostics,
  printHeader,
  printInfo,
  printRunReport,
  printSuccess,
  printWarning,
  printError,
  startSpinner,
  succeedSpinner,
  updateSpinner,
  theme,
} from '../output.js';

export interface DeployOptions {
  json?: boolean;
  verbose?: boolean;
  /** Overrides the git-backed version control, used by tests */
  vcs?: VersionControl;
  config?: Config;
}

/**
 * Echo a run log entry to the console
 */
export function echoEntry(entry: LogEntry): void {
  const line = `[${entry.stage}] ${entry.message}`;
  switch (entry.level) {
    case 'error':
      printError(line);
      break;
    case 'warn':
      printWarning(line);
      break;
    case 'success':
      printSuccess(line);
      break;
    case 'debug':
      console.log(theme.dim(`[DEBUG] ${line}`));
      break;
    default:
      printInfo(line);
  }
}

/**
 * Build the run logger for a command invocation
 */
export function createRunLogger(projectDir: string, config: Config, target: string, verbose: boolean): RunLogger {
  const logFile = config.output.log_to_file
    ? runLogPath(path.resolve(projectDir, config.output.logs_dir), target)
    : null;
  return new RunLogger({ logFile, onEntry: verbose ? echoEntry : undefined });
}

/**
 * Run the pipeline and print the result (exported for testability)
 */
export async function runDeploy(
  projectDir: string,
  revisionA: string,
  revisionB: string,
  target: string,
  options: DeployOptions = {}
): Promise<RunReport> {
  const config = options.config ?? await loadConfig(projectDir);
  const verbose = Boolean(options.verbose ?? config.output.verbose) && !options.json;
  const logger = createRunLogger(projectDir, config, target, verbose);
  const interactive = !options.json && !verbose;

  if (!options.json) {
    printHeader(`Deploy static resources: ${target}`);
  }
  if (interactive) {
    startSpinner('Starting');
  }

  try {
    const report = await runPipeline({
      projectDir,
      revisionA,
      revisionB,
      target,
      config,
      vcs: options.vcs,
      logger,
      onProgress: (phase, message) => {
        if (interactive) {
          updateSpinner(`[${phase}] ${message}`);
        }
      },
    });

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
      return report;
    }

    if (interactive) {
      succeedSpinner(`Promoted ${report.promoted.length} file(s)`);
    }
    printRunReport(report);
    return report;
  } catch (error) {
    if (interactive) {
      failSpinner('Deploy failed');
    }
    throw error;
  }
}

/**
 * Create the deploy command
 */
export function createDeployCommand(): Command {
  return new Command('deploy')
    .description('Package changed static resources into the change-set deployment directory')
    .argument('<revisionA>', 'Base revision, or the full-snapshot sentinel (FD)')
    .argument('<revisionB>', 'Head revision')
    .argument('<target>', 'Environment label; keys the staging area')
    .option('-C, --cwd <dir>', 'Project directory', '.')
    .option('--json', 'Print the run report as JSON')
    .option('-v, --verbose', 'Echo every run log entry')
    .action(async (
      revisionA: string,
      revisionB: string,
      target: string,
      options: { cwd: string; json?: boolean; verbose?: boolean }
    ) => {
      try {
        await runDeploy(path.resolve(options.cwd), revisionA, revisionB, target, {
          json: options.json,
          verbose: options.verbose,
        });
      } catch (error) {
        printDiagnostics(error);
        process.exit(1);
      }
    });
}
