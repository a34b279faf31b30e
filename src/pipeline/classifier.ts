/**
 * Resource Unit Classifier — groups changed paths into static resource units
 * and resolves each unit's physical representation.
 */

import { join } from 'node:path';

import type {
  ChangedPath,
  ResourceUnit,
  ResourceUnitMap,
} from '../types/resource.js';
import { isDirectory, isFile } from './fs-ops.js';
import { descriptorFileName, resourceFileName } from './layout.js';

export function createUnit(name: string): ResourceUnit {
  return {
    name,
    representation: 'Unresolved',
    hasDescriptor: false,
    stagingPathsWritten: new Set(),
    hints: new Set(),
    resolvedBy: 'none',
    removed: false,
  };
}

/**
 * Resolve a unit that the change set gave no content hint for.
 * A directory is checked before a loose `.resource` file.
 */
function resolveFromSource(unit: ResourceUnit, sourceDir: string, present: boolean): void {
  if (isDirectory(join(sourceDir, unit.name))) {
    unit.representation = 'DirectoryBacked';
    unit.resolvedBy = 'source-lookup';
  } else if (isFile(join(sourceDir, resourceFileName(unit.name)))) {
    unit.representation = 'SingleFileBacked';
    unit.resolvedBy = 'source-lookup';
  } else if (!present) {
    unit.removed = true;
  }
}

/**
 * Group changed paths by unit and assign each unit a representation.
 * The returned map iterates in ascending unit-name order.
 */
export function classify(changes: ChangedPath[], sourceDir: string): ResourceUnitMap {
  const units = new Map<string, ResourceUnit>();
  // Units with at least one path that still exists after the change
  const present = new Set<string>();

  for (const change of changes) {
    if (change.representationHint === 'Unknown') continue;

    let unit = units.get(change.unitName);
    if (!unit) {
      unit = createUnit(change.unitName);
      units.set(change.unitName, unit);
    }
    if (change.deleted) continue;

    present.add(unit.name);
    if (change.representationHint === 'MetaDescriptor') {
      unit.hasDescriptor = true;
    } else {
      unit.hints.add(change.representationHint);
    }
  }

  for (const unit of units.values()) {
    if (unit.hints.has('Directory')) {
      unit.representation = 'DirectoryBacked';
      unit.resolvedBy = 'changeset';
    } else if (unit.hints.has('SingleFile')) {
      unit.representation = 'SingleFileBacked';
      unit.resolvedBy = 'changeset';
    } else {
      resolveFromSource(unit, sourceDir, present.has(unit.name));
    }

    if (!unit.hasDescriptor) {
      unit.hasDescriptor = isFile(join(sourceDir, descriptorFileName(unit.name)));
    }
  }

  const sorted = [...units.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return new Map(sorted.map((unit) => [unit.name, unit]));
}
