/**
 * Pipeline Orchestrator — runs one (revisionA, revisionB, target) triple
 * through diff → classify → validate → assemble → promote.
 *
 * Validation of the whole unit set happens before anything is staged, and
 * nothing reaches the deployable directory unless every unit assembled.
 */

import type { Config } from '../config/index.js';
import {
  isResolvedUnit,
  type ChangedPath,
  type ResourceUnitMap,
  type RunMode,
} from '../types/resource.js';
import type { RunReport, UnitReport } from '../types/run.js';
import { assemble, type AssembleResult } from './assembler.js';
import { classify } from './classifier.js';
import { validateStaging, validateUnits } from './conflict-detector.js';
import { listChanges } from './diff-source.js';
import {
  AssemblyError,
  ExternalToolError,
  MissingSourceError,
  UsageError,
  isPipelineError,
  type PipelinePhase,
  type UnitFailure,
} from './errors.js';
import {
  descriptorFileName,
  resolveLayout,
  resolveStagingBase,
  resourceFileName,
  type ResourceLayout,
} from './layout.js';
import { RunLogger } from './run-logger.js';
import { StagingArea } from './staging-area.js';
import { promote } from './staging-copier.js';
import { GitVersionControl, type VersionControl } from './vcs.js';

// ─── Types ───────────────────────────────────────────────

export interface PlanOptions {
  projectDir: string;
  revisionA: string;
  revisionB: string | null;
  config: Config;
  vcs?: VersionControl;
  logger?: RunLogger;
  onProgress?: (phase: PipelinePhase, message: string) => void;
}

export interface PipelineOptions extends PlanOptions {
  /** Environment/target label; keys the staging area */
  target: string;
}

interface PreparedRun {
  layout: ResourceLayout;
  mode: RunMode;
  changes: ChangedPath[];
  units: ResourceUnitMap;
}

// ─── Helpers ─────────────────────────────────────────────

export function resolveRunMode(revisionA: string, config: Config): RunMode {
  return revisionA === config.vcs.full_snapshot_sentinel ? 'FullSnapshot' : 'RevisionRange';
}

function ignoredPaths(changes: ChangedPath[]): string[] {
  return changes.filter((c) => c.representationHint === 'Unknown').map((c) => c.rawPath);
}

/** File names a unit will have in the deployable directory */
function expectedArtifacts(name: string): string[] {
  return [resourceFileName(name), descriptorFileName(name)];
}

function buildUnitReports(units: ResourceUnitMap, results: Map<string, AssembleResult> | null): UnitReport[] {
  return [...units.values()].map((unit): UnitReport => {
    const result = results?.get(unit.name);
    return {
      name: unit.name,
      representation: unit.representation,
      hasDescriptor: unit.hasDescriptor,
      status: unit.removed ? 'removed' : result ? result.status : 'planned',
      artifacts: unit.removed ? [] : result ? result.artifacts : expectedArtifacts(unit.name),
    };
  });
}

function isUnitFailure(error: unknown): error is UnitFailure {
  return error instanceof MissingSourceError || error instanceof ExternalToolError;
}

async function prepare(options: PlanOptions, logger: RunLogger): Promise<PreparedRun> {
  const { projectDir, revisionA, revisionB, config } = options;
  const layout = resolveLayout(projectDir, config);
  const mode = resolveRunMode(revisionA, config);
  const vcs = options.vcs ?? new GitVersionControl({ repoDir: projectDir, gitBinary: config.vcs.git_binary });

  if (mode === 'RevisionRange' && revisionB === null) {
    throw new UsageError(`A revision range needs a second revision after ${revisionA}`);
  }

  options.onProgress?.('diff', mode === 'FullSnapshot'
    ? `Listing all static resources under ${layout.sourcePrefix}`
    : `Listing changes between ${revisionA} and ${revisionB}`);
  const changes = await listChanges(mode, revisionA, revisionB, layout, vcs);
  await logger.info('diff', `${changes.length} changed path(s) under ${layout.sourcePrefix}`, { mode });

  for (const rawPath of ignoredPaths(changes)) {
    await logger.warn('diff', `Ignoring ${rawPath}: not a static resource, directory or descriptor`);
  }

  options.onProgress?.('classify', 'Classifying static resource units');
  const units = classify(changes, layout.sourceDir);
  for (const unit of units.values()) {
    if (unit.removed) {
      await logger.warn('classify', `${unit.name} was deleted; nothing to package`);
      continue;
    }
    await logger.debug('classify', `${unit.name} → ${unit.representation}`, {
      resolvedBy: unit.resolvedBy,
      hasDescriptor: unit.hasDescriptor,
    });
  }

  return { layout, mode, changes, units };
}

async function recordFailure(logger: RunLogger, error: unknown): Promise<void> {
  if (isPipelineError(error)) {
    for (const line of error.diagnostics()) {
      await logger.error(error.phase, line);
    }
  } else {
    await logger.error('run', error instanceof Error ? error.message : String(error));
  }
  await logger.end('failed');
}

// ─── Plan ────────────────────────────────────────────────

/**
 * Diff, classify and validate without touching staging or the deployable
 * directory.
 */
export async function planRun(options: PlanOptions): Promise<RunReport> {
  const startedAt = new Date().toISOString();
  const logger = options.logger ?? new RunLogger({ logFile: null });

  try {
    const { layout, mode, changes, units } = await prepare(options, logger);

    options.onProgress?.('validate', 'Checking for conflicting representations');
    validateUnits(units, { sourceDir: layout.sourceDir });

    return {
      target: '',
      mode,
      revisionA: options.revisionA,
      revisionB: options.revisionB,
      startedAt,
      finishedAt: new Date().toISOString(),
      stagingDir: null,
      deployDir: layout.deployDir,
      units: buildUnitReports(units, null),
      promoted: [],
      ignoredPaths: ignoredPaths(changes),
    };
  } catch (error) {
    await recordFailure(logger, error);
    throw error;
  }
}

// ─── Run ─────────────────────────────────────────────────

/**
 * Run the full pipeline for one target.
 */
export async function runPipeline(options: PipelineOptions): Promise<RunReport> {
  const { projectDir, revisionA, revisionB, target, config } = options;
  const startedAt = new Date().toISOString();
  const logger = options.logger ?? new RunLogger({ logFile: null });

  await logger.begin(`${target} ${revisionA}..${revisionB ?? ''} (${startedAt})`);

  try {
    const staging = new StagingArea(resolveStagingBase(config, projectDir), target);
    staging.reset();
    await logger.info('run', `Staging area reset at ${staging.dir}`);

    const { layout, mode, changes, units } = await prepare(options, logger);

    // Validate
    options.onProgress?.('validate', 'Checking for conflicting representations');
    validateUnits(units, { sourceDir: layout.sourceDir, stagingDir: staging.dir });
    staging.writeManifest(units);

    // Assemble
    const results = new Map<string, AssembleResult>();
    const failures: UnitFailure[] = [];
    for (const unit of units.values()) {
      if (unit.removed || !isResolvedUnit(unit)) continue;

      options.onProgress?.('assemble', `Staging ${unit.name}`);
      try {
        const result = await assemble(unit, { sourceDir: layout.sourceDir, staging });
        results.set(unit.name, result);
        if (result.status === 'skipped') {
          await logger.info('assemble', `${unit.name} already staged, skipping`);
        } else {
          await logger.success('assemble', `Staged ${result.artifacts.join(', ')}`);
        }
      } catch (error) {
        if (!isUnitFailure(error)) throw error;
        failures.push(error);
        await logger.error('assemble', error.message);
      }
    }
    if (failures.length > 0) {
      throw new AssemblyError(failures);
    }
    validateStaging(staging.dir);

    // Promote
    options.onProgress?.('promote', `Copying artifacts to ${layout.deployDir}`);
    const promoted = promote(staging, layout.deployDir);
    staging.drain();
    await logger.success('promote', `Promoted ${promoted.length} file(s) to ${layout.deployDir}`, {
      files: promoted.map((p) => p.deployed),
    });
    await logger.end('succeeded');

    return {
      target,
      mode,
      revisionA,
      revisionB,
      startedAt,
      finishedAt: new Date().toISOString(),
      stagingDir: staging.dir,
      deployDir: layout.deployDir,
      units: buildUnitReports(units, results),
      promoted: promoted.map((p) => p.deployed),
      ignoredPaths: ignoredPaths(changes),
    };
  } catch (error) {
    await recordFailure(logger, error);
    throw error;
  }
}
