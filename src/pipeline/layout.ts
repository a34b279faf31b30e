/**
 * Resource layout — where static resources live, and how a path under the
 * static-resource root maps to a unit.
 */

import { tmpdir } from 'node:os';
import { isAbsolute, join, posix, resolve } from 'node:path';

import type { Config } from '../config/index.js';
import {
  ARCHIVE_SUFFIX,
  DESCRIPTOR_SUFFIX,
  RESOURCE_SUFFIX,
  type ChangedPath,
} from '../types/resource.js';

// ─── Layout ──────────────────────────────────────────────

export interface ResourceLayout {
  projectDir: string;
  /** Project-relative prefix the change source is restricted to, e.g. `src` */
  metadataRoot: string;
  /** Project-relative static-resource root, e.g. `src/staticresources` */
  sourcePrefix: string;
  /** Absolute static-resource root in the source tree */
  sourceDir: string;
  /** Absolute deployable directory */
  deployDir: string;
}

function toPosix(p: string): string {
  return p.replace(/\\/g, '/').replace(/\/+$/, '');
}

export function resolveLayout(projectDir: string, config: Config): ResourceLayout {
  const { metadata_root, static_resource_dir, deploy_root } = config.layout;
  const metadataRoot = toPosix(metadata_root);
  const sourcePrefix = posix.join(metadataRoot, toPosix(static_resource_dir));

  return {
    projectDir,
    metadataRoot,
    sourcePrefix,
    sourceDir: join(projectDir, sourcePrefix),
    deployDir: join(projectDir, toPosix(deploy_root), toPosix(static_resource_dir)),
  };
}

/** Directory under which per-target staging areas are created */
export function resolveStagingBase(config: Config, projectDir: string): string {
  const base = config.staging.base_dir;
  if (base === null) return tmpdir();
  return isAbsolute(base) ? base : resolve(projectDir, base);
}

// ─── File Names ──────────────────────────────────────────

export function descriptorFileName(unitName: string): string {
  return `${unitName}${DESCRIPTOR_SUFFIX}`;
}

export function resourceFileName(unitName: string): string {
  return `${unitName}${RESOURCE_SUFFIX}`;
}

export function archiveFileName(unitName: string): string {
  return `${unitName}${ARCHIVE_SUFFIX}`;
}

// ─── Path Parsing ────────────────────────────────────────

/**
 * Classify a single file name found directly under the static-resource root.
 * A loose file without a recognised suffix is Unknown rather than Directory:
 * no `<name>/` exists for it, so packaging it could only fail at assembly.
 */
export function parseEntryName(name: string, rawPath: string, deleted = false): ChangedPath {
  if (name.endsWith(DESCRIPTOR_SUFFIX) && name.length > DESCRIPTOR_SUFFIX.length) {
    return {
      rawPath,
      deleted,
      representationHint: 'MetaDescriptor',
      unitName: name.slice(0, -DESCRIPTOR_SUFFIX.length),
    };
  }
  if (name.endsWith(RESOURCE_SUFFIX) && name.length > RESOURCE_SUFFIX.length) {
    return {
      rawPath,
      deleted,
      representationHint: 'SingleFile',
      unitName: name.slice(0, -RESOURCE_SUFFIX.length),
    };
  }
  return { rawPath, deleted, representationHint: 'Unknown', unitName: null };
}

/**
 * Parse a project-relative path into a tagged ChangedPath.
 * Returns null for paths outside the static-resource root.
 */
export function parseResourcePath(
  rawPath: string,
  sourcePrefix: string,
  deleted = false,
): ChangedPath | null {
  const normalized = toPosix(rawPath);
  const prefix = `${toPosix(sourcePrefix)}/`;
  if (!normalized.startsWith(prefix)) return null;

  const segments = normalized.slice(prefix.length).split('/').filter(Boolean);
  if (segments.length === 0) return null;

  if (segments.length > 1) {
    return {
      rawPath: normalized,
      deleted,
      representationHint: 'Directory',
      unitName: segments[0],
    };
  }

  return parseEntryName(segments[0], normalized, deleted);
}
