/**
 * Conflict Detector — a unit may have at most one physical representation.
 * Runs over the full unit set before anything is staged, and over the
 * staging directory again before promotion.
 */

import { existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';

import { ARCHIVE_SUFFIX, RESOURCE_SUFFIX, type ResourceUnitMap } from '../types/resource.js';
import { ConflictError, type ConflictRule, type UnitConflict } from './errors.js';
import { isDirectory, isFile } from './fs-ops.js';
import { archiveFileName, descriptorFileName, resourceFileName } from './layout.js';

const RULE_ORDER: readonly ConflictRule[] = [
  'dual-source',
  'dual-staged',
  'dual-changeset',
  'missing-descriptor',
  'unresolved',
];

export interface ValidateOptions {
  sourceDir: string;
  /** Omitted when no staging area exists yet (plan mode) */
  stagingDir?: string;
}

function compareConflicts(a: UnitConflict, b: UnitConflict): number {
  if (a.unitName !== b.unitName) return a.unitName < b.unitName ? -1 : 1;
  return RULE_ORDER.indexOf(a.rule) - RULE_ORDER.indexOf(b.rule);
}

function stagedBoth(stagingDir: string, unitName: string): boolean {
  return isFile(join(stagingDir, archiveFileName(unitName)))
    && isFile(join(stagingDir, resourceFileName(unitName)));
}

function stagedConflict(stagingDir: string, unitName: string): UnitConflict {
  return {
    unitName,
    rule: 'dual-staged',
    message: `both ${archiveFileName(unitName)} and ${resourceFileName(unitName)} are staged at ${stagingDir}`,
  };
}

/**
 * Collect every conflict in the unit set, sorted by unit then rule.
 */
export function findConflicts(units: ResourceUnitMap, options: ValidateOptions): UnitConflict[] {
  const conflicts: UnitConflict[] = [];

  for (const unit of units.values()) {
    if (unit.removed) continue;
    const name = unit.name;

    if (isDirectory(join(options.sourceDir, name)) && isFile(join(options.sourceDir, resourceFileName(name)))) {
      conflicts.push({
        unitName: name,
        rule: 'dual-source',
        message: `both ${name}/ and ${resourceFileName(name)} exist at ${options.sourceDir}`,
      });
    }

    if (options.stagingDir && stagedBoth(options.stagingDir, name)) {
      conflicts.push(stagedConflict(options.stagingDir, name));
    }

    if (unit.hints.has('Directory') && unit.hints.has('SingleFile')) {
      conflicts.push({
        unitName: name,
        rule: 'dual-changeset',
        message: 'changed both as a directory and as a single file',
      });
    }

    if (unit.representation !== 'Unresolved' && !isFile(join(options.sourceDir, descriptorFileName(name)))) {
      conflicts.push({
        unitName: name,
        rule: 'missing-descriptor',
        message: `${descriptorFileName(name)} not found at ${options.sourceDir}`,
      });
    }

    if (unit.representation === 'Unresolved') {
      conflicts.push({
        unitName: name,
        rule: 'unresolved',
        message: `descriptor has no ${name}/ directory or ${resourceFileName(name)} file at ${options.sourceDir}`,
      });
    }
  }

  return conflicts.sort(compareConflicts);
}

/**
 * Throw a ConflictError naming every offending unit, or return silently.
 */
export function validateUnits(units: ResourceUnitMap, options: ValidateOptions): void {
  const conflicts = findConflicts(units, options);
  if (conflicts.length > 0) {
    throw new ConflictError(conflicts);
  }
}

/**
 * Scan a staging directory for units staged both as an archive and as a
 * single file.
 */
export function findStagingConflicts(stagingDir: string): UnitConflict[] {
  if (!existsSync(stagingDir)) return [];

  const names = new Set(readdirSync(stagingDir));
  const conflicts: UnitConflict[] = [];
  for (const entry of [...names].sort()) {
    if (!entry.endsWith(ARCHIVE_SUFFIX)) continue;
    const unitName = entry.slice(0, -ARCHIVE_SUFFIX.length);
    if (names.has(`${unitName}${RESOURCE_SUFFIX}`)) {
      conflicts.push(stagedConflict(stagingDir, unitName));
    }
  }
  return conflicts;
}

export function validateStaging(stagingDir: string): void {
  const conflicts = findStagingConflicts(stagingDir);
  if (conflicts.length > 0) {
    throw new ConflictError(conflicts);
  }
}
