/**
 * Doctor command
 * Checks that a project is ready for a static resource deploy
 */

import { Command } from 'commander';
import path from 'node:path';
import { loadConfig, type Config } from '../../config/index.js';
import { isDirectory } from '../../pipeline/fs-ops.js';
import { resolveLayout, resolveStagingBase } from '../../pipeline/layout.js';
import { STAGING_DIR_SUFFIX } from '../../pipeline/staging-area.js';
import { GitVersionControl } from '../../pipeline/vcs.js';
import {
  printHeader,
  printSuccess,
  printError,
  printWarning,
  printInfo,
} from '../output.js';

export type CheckSeverity = 'critical' | 'warning' | 'info';

export interface DoctorCheck {
  name: string;
  passed: boolean;
  message: string;
  severity: CheckSeverity;
}

export interface DoctorResult {
  healthy: boolean;
  checks: DoctorCheck[];
  timestamp: string;
}

/** What the doctor needs to know about the version-control tool */
export interface VcsProbe {
  version(): Promise<string | null>;
  isWorkTree(): Promise<boolean>;
}

/**
 * Run all readiness checks and return structured results
 */
export async function runDoctorChecks(
  projectDir: string,
  config: Config,
  probe: VcsProbe = new GitVersionControl({ repoDir: projectDir, gitBinary: config.vcs.git_binary })
): Promise<DoctorResult> {
  const checks: DoctorCheck[] = [];
  const layout = resolveLayout(projectDir, config);

  // Check 1: git can be run
  const version = await probe.version();
  checks.push({
    name: 'Git Available',
    passed: version !== null,
    message: version ?? `Cannot run "${config.vcs.git_binary}"`,
    severity: 'critical',
  });

  // Check 2: project is a work tree (revision ranges need one)
  if (version !== null) {
    const workTree = await probe.isWorkTree();
    checks.push({
      name: 'Git Work Tree',
      passed: workTree,
      message: workTree
        ? `${projectDir} is inside a git work tree`
        : `${projectDir} is not a git work tree; only full snapshots (${config.vcs.full_snapshot_sentinel}) will work`,
      severity: 'warning',
    });
  }

  // Check 3: static resource source directory
  const hasSource = isDirectory(layout.sourceDir);
  checks.push({
    name: 'Static Resource Source',
    passed: hasSource,
    message: hasSource
      ? `${layout.sourcePrefix} exists`
      : `${layout.sourcePrefix} not found; check layout.metadata_root and layout.static_resource_dir`,
    severity: 'critical',
  });

  // Check 4: deployable directory (created on first deploy)
  const hasDeploy = isDirectory(layout.deployDir);
  checks.push({
    name: 'Deploy Directory',
    passed: hasDeploy,
    message: hasDeploy ? layout.deployDir : `${layout.deployDir} will be created on first deploy`,
    severity: 'info',
  });

  // Check 5: staging base
  const stagingBase = resolveStagingBase(config, projectDir);
  const hasStagingBase = isDirectory(stagingBase);
  checks.push({
    name: 'Staging Base',
    passed: hasStagingBase,
    message: hasStagingBase
      ? `Staging areas go in ${path.join(stagingBase, `<target>${STAGING_DIR_SUFFIX}`)}`
      : `${stagingBase} does not exist`,
    severity: 'warning',
  });

  const healthy = checks
    .filter((c) => c.severity === 'critical')
    .every((c) => c.passed);

  return {
    healthy,
    checks,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Create the doctor command
 */
export function createDoctorCommand(): Command {
  const doctor = new Command('doctor')
    .description('Check that the project is ready for a static resource deploy')
    .argument('[directory]', 'Project directory', '.')
    .action(async (directory: string) => {
      const projectDir = path.resolve(directory);

      printHeader('srpack doctor');

      const config = await loadConfig(projectDir);
      const result = await runDoctorChecks(projectDir, config);

      for (const check of result.checks) {
        const statusLabel = check.passed ? '[PASS]' : check.severity === 'info' ? '[SKIP]' : '[FAIL]';

        if (check.passed) {
          printSuccess(`  ${statusLabel} ${check.name}: ${check.message}`);
        } else if (check.severity === 'info') {
          printInfo(`  ${statusLabel} ${check.name}: ${check.message}`);
        } else if (check.severity === 'warning') {
          printWarning(`  ${statusLabel} ${check.name}: ${check.message}`);
        } else {
          printError(`  ${statusLabel} ${check.name}: ${check.message}`);
        }
      }

      console.log();
      if (result.healthy) {
        printSuccess('All critical checks passed.');
      } else {
        printError('Some critical checks failed. Fix the issues above and re-run.');
        process.exit(1);
      }
    });

  return doctor;
}
