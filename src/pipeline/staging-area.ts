/**
 * Staging Area — per-target scratch directory where artifacts are
 * assembled before promotion. Recreated empty at the start of every run.
 */

import { readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import type { ResourceUnitMap } from '../types/resource.js';
import { UsageError } from './errors.js';
import { ensureDir, isFile, removePath } from './fs-ops.js';
import { archiveFileName, resourceFileName } from './layout.js';

// ─── Constants ───────────────────────────────────────────

export const STAGING_DIR_SUFFIX = '.StaticResource';

/** Transient helper file listing the classified units of the run */
export const UNITS_MANIFEST_FILE = '.srpack-units.json';

/** Suffix of files still being written */
export const PARTIAL_SUFFIX = '.partial';

const HELPER_FILES = new Set([UNITS_MANIFEST_FILE]);

const TARGET_LABEL_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

// ─── Staging Area ────────────────────────────────────────

export class StagingArea {
  readonly target: string;
  readonly dir: string;

  constructor(baseDir: string, target: string) {
    if (!TARGET_LABEL_PATTERN.test(target)) {
      throw new UsageError(`Invalid target label "${target}": use letters, digits, ".", "_" or "-"`);
    }
    this.target = target;
    this.dir = join(baseDir, `${target}${STAGING_DIR_SUFFIX}`);
  }

  /** Remove any previous contents and recreate the directory */
  reset(): void {
    removePath(this.dir);
    ensureDir(this.dir);
  }

  pathFor(fileName: string): string {
    return join(this.dir, fileName);
  }

  /** True when an archive or single-file artifact for the unit is staged */
  hasArtifact(unitName: string): boolean {
    return isFile(this.pathFor(archiveFileName(unitName)))
      || isFile(this.pathFor(resourceFileName(unitName)));
  }

  writeManifest(units: ResourceUnitMap): void {
    const manifest = [...units.values()].map((unit) => ({
      name: unit.name,
      representation: unit.representation,
      resolvedBy: unit.resolvedBy,
      hasDescriptor: unit.hasDescriptor,
      removed: unit.removed,
    }));
    writeFileSync(this.pathFor(UNITS_MANIFEST_FILE), JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
  }

  removeHelperFiles(): void {
    for (const helper of HELPER_FILES) {
      removePath(this.pathFor(helper));
    }
  }

  /** Finished artifact file names, sorted */
  listArtifacts(): string[] {
    return readdirSync(this.dir, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .filter((name) => !HELPER_FILES.has(name) && !name.endsWith(PARTIAL_SUFFIX))
      .sort();
  }

  /** Empty the directory, keeping the directory itself */
  drain(): void {
    for (const name of readdirSync(this.dir)) {
      removePath(this.pathFor(name));
    }
  }
}
