/**
 * Static resource type definitions
 * Changed paths, resource units and their representations
 */

import { z } from 'zod';

// ─── Suffixes ────────────────────────────────────────────

/** Single-file resource and deployed archive extension */
export const RESOURCE_SUFFIX = '.resource';

/** Descriptor file suffix, appended to the unit name */
export const DESCRIPTOR_SUFFIX = '.resource-meta.xml';

/** Archive extension used inside the staging area */
export const ARCHIVE_SUFFIX = '.zip';

// ─── Enums ───────────────────────────────────────────────

export const RepresentationHintSchema = z.enum([
  'Directory',
  'SingleFile',
  'MetaDescriptor',
  'Unknown',
]);
export type RepresentationHint = z.infer<typeof RepresentationHintSchema>;

/** Hints that carry resource payload, as opposed to descriptors */
export type ContentHint = Extract<RepresentationHint, 'Directory' | 'SingleFile'>;

export const RepresentationSchema = z.enum([
  'DirectoryBacked',
  'SingleFileBacked',
  'Unresolved',
]);
export type Representation = z.infer<typeof RepresentationSchema>;

export const ResolutionSourceSchema = z.enum(['changeset', 'source-lookup', 'none']);
export type ResolutionSource = z.infer<typeof ResolutionSourceSchema>;

export const RunModeSchema = z.enum(['FullSnapshot', 'RevisionRange']);
export type RunMode = z.infer<typeof RunModeSchema>;

// ─── Changed Paths ───────────────────────────────────────

interface ChangedPathBase {
  /** Path as reported by the change source, relative to the project root */
  rawPath: string;
  /** True when the revision range removed this path */
  deleted: boolean;
}

export interface UnitChangedPath extends ChangedPathBase {
  representationHint: Exclude<RepresentationHint, 'Unknown'>;
  unitName: string;
}

export interface UnknownChangedPath extends ChangedPathBase {
  representationHint: 'Unknown';
  unitName: null;
}

/**
 * A single path reported between two revisions, tagged with the kind of
 * static resource it belongs to
 */
export type ChangedPath = UnitChangedPath | UnknownChangedPath;

// ─── Resource Units ──────────────────────────────────────

/**
 * The logical entity being packaged: one static resource and its descriptor
 */
export interface ResourceUnit {
  name: string;
  representation: Representation;
  hasDescriptor: boolean;
  /** Paths already materialized in the staging area during this run */
  stagingPathsWritten: Set<string>;
  /** Content kinds the change set reported for this unit */
  hints: Set<ContentHint>;
  resolvedBy: ResolutionSource;
  /** Every reported path was a deletion and nothing is left in the source tree */
  removed: boolean;
}

export interface ResolvedResourceUnit extends ResourceUnit {
  representation: Exclude<Representation, 'Unresolved'>;
}

export function isResolvedUnit(unit: ResourceUnit): unit is ResolvedResourceUnit {
  return unit.representation !== 'Unresolved';
}

export type ResourceUnitMap = Map<string, ResourceUnit>;
