/**
 * CLI command: srpack plan
 *
 * Dry run: lists and validates the static resource units a deploy would
 * package, without writing to staging or the deployment directory.
 */

import { Command } from 'commander';
import path from 'node:path';
import { loadConfig, type Config } from '../../config/index.js';
import { planRun } from '../../pipeline/orchestrator.js';
import { RunLogger } from '../../pipeline/run-logger.js';
import type { VersionControl } from '../../pipeline/vcs.js';
import type { RunReport } from '../../types/run.js';
import { printDiagnostics, printHeader, printRunReport, printSuccess } from '../output.js';
import { echoEntry } from './deploy.js';

export interface PlanCommandOptions {
  json?: boolean;
  verbose?: boolean;
  vcs?: VersionControl;
  config?: Config;
}

/**
 * Plan a run and print the unit table (exported for testability)
 */
export async function runPlan(
  projectDir: string,
  revisionA: string,
  revisionB: string | null,
  options: PlanCommandOptions = {}
): Promise<RunReport> {
  const config = options.config ?? await loadConfig(projectDir);
  const verbose = Boolean(options.verbose ?? config.output.verbose) && !options.json;

  const report = await planRun({
    projectDir,
    revisionA,
    revisionB,
    config,
    vcs: options.vcs,
    logger: new RunLogger({ logFile: null, onEntry: verbose ? echoEntry : undefined }),
  });

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return report;
  }

  printHeader('Static Resource Plan');
  printRunReport(report);
  const packaged = report.units.filter((unit) => unit.status === 'planned').length;
  printSuccess(`${packaged} static resource(s) would be packaged`);
  return report;
}

/**
 * Create the plan command
 */
export function createPlanCommand(): Command {
  return new Command('plan')
    .description('Show which static resources a deploy would package, without writing anything')
    .argument('<revisionA>', 'Base revision, or the full-snapshot sentinel (FD)')
    .argument('[revisionB]', 'Head revision (not needed for a full snapshot)')
    .option('-C, --cwd <dir>', 'Project directory', '.')
    .option('--json', 'Print the plan as JSON')
    .option('-v, --verbose', 'Echo every log entry')
    .action(async (
      revisionA: string,
      revisionB: string | undefined,
      options: { cwd: string; json?: boolean; verbose?: boolean }
    ) => {
      try {
        await runPlan(path.resolve(options.cwd), revisionA, revisionB ?? null, {
          json: options.json,
          verbose: options.verbose,
        });
      } catch (error) {
        printDiagnostics(error);
        process.exit(1);
      }
    });
}
