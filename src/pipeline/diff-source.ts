/**
 * Revision Diff Source — lists the static-resource paths that changed,
 * either between two revisions or, for a full deploy, every entry under
 * the static-resource root.
 */

import { existsSync, readdirSync, type Dirent } from 'node:fs';
import { posix } from 'node:path';

import type { ChangedPath, RunMode } from '../types/resource.js';
import { ExternalToolError, UsageError } from './errors.js';
import { parseEntryName, parseResourcePath, type ResourceLayout } from './layout.js';
import type { VersionControl } from './vcs.js';

/** Enumerate every immediate child of the static-resource root */
function listSnapshot(layout: ResourceLayout): ChangedPath[] {
  if (!existsSync(layout.sourceDir)) return [];

  let entries: Dirent[];
  try {
    entries = readdirSync(layout.sourceDir, { withFileTypes: true });
  } catch (error) {
    throw new ExternalToolError(`list ${layout.sourceDir}`, 'diff', null, error);
  }

  const changes: ChangedPath[] = [];
  for (const entry of entries) {
    const rawPath = posix.join(layout.sourcePrefix, entry.name);
    if (entry.isDirectory()) {
      changes.push({ rawPath, deleted: false, representationHint: 'Directory', unitName: entry.name });
      continue;
    }
    if (!entry.isFile()) continue;

    const parsed = parseEntryName(entry.name, rawPath);
    // Loose files are only reported for revision ranges
    if (parsed.representationHint !== 'Unknown') {
      changes.push(parsed);
    }
  }
  return changes;
}

async function listRange(
  revisionA: string,
  revisionB: string,
  layout: ResourceLayout,
  vcs: VersionControl,
): Promise<ChangedPath[]> {
  const reported = await vcs.changedPaths(revisionA, revisionB, layout.metadataRoot);

  const changes: ChangedPath[] = [];
  for (const change of reported) {
    const parsed = parseResourcePath(change.path, layout.sourcePrefix, change.deleted);
    if (parsed) changes.push(parsed);
  }
  return changes;
}

/** Deduplicate by rawPath (present wins over deleted) and sort */
function normalizeChanges(changes: ChangedPath[]): ChangedPath[] {
  const byPath = new Map<string, ChangedPath>();
  for (const change of changes) {
    const existing = byPath.get(change.rawPath);
    if (!existing || (existing.deleted && !change.deleted)) {
      byPath.set(change.rawPath, change);
    }
  }
  return [...byPath.values()].sort((a, b) => (a.rawPath < b.rawPath ? -1 : a.rawPath > b.rawPath ? 1 : 0));
}

/**
 * List the changed static-resource paths for a run.
 * `revisionB` is ignored in FullSnapshot mode.
 */
export async function listChanges(
  mode: RunMode,
  revisionA: string,
  revisionB: string | null,
  layout: ResourceLayout,
  vcs: VersionControl,
): Promise<ChangedPath[]> {
  if (mode === 'FullSnapshot') {
    return normalizeChanges(listSnapshot(layout));
  }
  if (revisionB === null) {
    throw new UsageError(`A revision range needs a second revision after ${revisionA}`);
  }
  return normalizeChanges(await listRange(revisionA, revisionB, layout, vcs));
}
