/**
 * Artifact Assembler — stages one deployable artifact per resolved unit.
 * Directory-backed units become `<name>.zip`; single-file units are copied
 * as-is. Every artifact is accompanied by its descriptor.
 */

import { cpSync, copyFileSync } from 'node:fs';
import { join } from 'node:path';

import type { ResolvedResourceUnit } from '../types/resource.js';
import { createZipArchive } from './archiver.js';
import { ExternalToolError, MissingSourceError, type PipelinePhase } from './errors.js';
import { isDirectory, isFile, isNotFoundError, removePath } from './fs-ops.js';
import { archiveFileName, descriptorFileName, resourceFileName } from './layout.js';
import type { StagingArea } from './staging-area.js';

export interface AssembleContext {
  sourceDir: string;
  staging: StagingArea;
}

export type AssembleStatus = 'staged' | 'skipped';

export interface AssembleResult {
  unitName: string;
  status: AssembleStatus;
  /** Staged file names, relative to the staging directory */
  artifacts: string[];
}

function toCopyError(unitName: string, operation: string, src: string, error: unknown): Error {
  const phase: PipelinePhase = 'assemble';
  return isNotFoundError(error)
    ? new MissingSourceError(unitName, src, phase)
    : new ExternalToolError(operation, phase, unitName, error);
}

function copyFileInto(unit: ResolvedResourceUnit, src: string, staging: StagingArea, fileName: string): void {
  try {
    copyFileSync(src, staging.pathFor(fileName));
  } catch (error) {
    throw toCopyError(unit.name, `copy ${fileName}`, src, error);
  }
  unit.stagingPathsWritten.add(fileName);
}

async function assembleDirectory(unit: ResolvedResourceUnit, sourceDir: string, staging: StagingArea): Promise<string[]> {
  const src = join(sourceDir, unit.name);
  if (!isDirectory(src)) {
    throw new MissingSourceError(unit.name, src);
  }

  const copied = staging.pathFor(unit.name);
  try {
    cpSync(src, copied, { recursive: true, errorOnExist: true, force: false });
  } catch (error) {
    removePath(copied);
    throw toCopyError(unit.name, `copy ${unit.name}/`, src, error);
  }

  const archive = archiveFileName(unit.name);
  try {
    await createZipArchive(copied, staging.pathFor(archive));
  } catch (error) {
    throw new ExternalToolError(`archive ${archive}`, 'assemble', unit.name, error);
  } finally {
    removePath(copied);
  }
  unit.stagingPathsWritten.add(archive);
  return [archive];
}

function assembleSingleFile(unit: ResolvedResourceUnit, sourceDir: string, staging: StagingArea): string[] {
  const fileName = resourceFileName(unit.name);
  const src = join(sourceDir, fileName);
  if (!isFile(src)) {
    throw new MissingSourceError(unit.name, src);
  }
  copyFileInto(unit, src, staging, fileName);
  return [fileName];
}

/**
 * Stage the artifact and descriptor for one unit.
 * A second call for the same unit in the same run is a no-op, as is a call
 * for a unit whose artifact is already in staging.
 */
export async function assemble(unit: ResolvedResourceUnit, context: AssembleContext): Promise<AssembleResult> {
  const { sourceDir, staging } = context;

  if (unit.stagingPathsWritten.size > 0 || staging.hasArtifact(unit.name)) {
    return { unitName: unit.name, status: 'skipped', artifacts: [...unit.stagingPathsWritten].sort() };
  }

  const descriptor = descriptorFileName(unit.name);
  const descriptorSrc = join(sourceDir, descriptor);
  if (!isFile(descriptorSrc)) {
    throw new MissingSourceError(unit.name, descriptorSrc);
  }

  const artifacts = unit.representation === 'DirectoryBacked'
    ? await assembleDirectory(unit, sourceDir, staging)
    : assembleSingleFile(unit, sourceDir, staging);

  copyFileInto(unit, descriptorSrc, staging, descriptor);

  return { unitName: unit.name, status: 'staged', artifacts: [...artifacts, descriptor].sort() };
}
