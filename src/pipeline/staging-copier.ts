/**
 * Staging Copier — the only stage that writes to the deployable directory.
 * Copies every staged artifact across, turning `<name>.zip` into
 * `<name>.resource`. Existing unrelated files are left alone.
 */

import { readdirSync } from 'node:fs';
import { join } from 'node:path';

import { ARCHIVE_SUFFIX, DESCRIPTOR_SUFFIX, RESOURCE_SUFFIX } from '../types/resource.js';
import { ExternalToolError } from './errors.js';
import { copyFileAtomic, ensureDir, removePath } from './fs-ops.js';
import type { StagingArea } from './staging-area.js';

/** Suffix of in-flight copies inside the deployable directory */
export const PROMOTE_TEMP_SUFFIX = '.srpack-partial';

export interface PromotedArtifact {
  /** Name in the staging directory */
  staged: string;
  /** Name in the deployable directory */
  deployed: string;
}

/** Deployable file name for a staged artifact */
export function deployedName(stagedName: string): string {
  return stagedName.endsWith(ARCHIVE_SUFFIX)
    ? `${stagedName.slice(0, -ARCHIVE_SUFFIX.length)}${RESOURCE_SUFFIX}`
    : stagedName;
}

/** Content files first, descriptors last */
function promotionOrder(names: string[]): string[] {
  const isDescriptor = (name: string): boolean => name.endsWith(DESCRIPTOR_SUFFIX);
  return [...names.filter((name) => !isDescriptor(name)), ...names.filter(isDescriptor)];
}

function tempName(name: string): string {
  return `.${name}${PROMOTE_TEMP_SUFFIX}`;
}

/** Remove copies left behind by an interrupted promotion */
function sweepPartialCopies(deployDir: string): void {
  for (const name of readdirSync(deployDir)) {
    if (name.startsWith('.') && name.endsWith(PROMOTE_TEMP_SUFFIX)) {
      removePath(join(deployDir, name));
    }
  }
}

/**
 * Copy all finished artifacts from staging into `deployDir`.
 */
export function promote(staging: StagingArea, deployDir: string): PromotedArtifact[] {
  try {
    ensureDir(deployDir);
    sweepPartialCopies(deployDir);
  } catch (error) {
    throw new ExternalToolError(`prepare ${deployDir}`, 'promote', null, error);
  }

  staging.removeHelperFiles();

  const promoted: PromotedArtifact[] = [];
  for (const staged of promotionOrder(staging.listArtifacts())) {
    const deployed = deployedName(staged);
    try {
      copyFileAtomic(staging.pathFor(staged), join(deployDir, deployed), join(deployDir, tempName(deployed)));
    } catch (error) {
      const unitName = deployed.replace(/\.resource(-meta\.xml)?$/, '');
      throw new ExternalToolError(`copy ${staged} to ${deployed}`, 'promote', unitName, error);
    }
    promoted.push({ staged, deployed });
  }

  return promoted;
}
