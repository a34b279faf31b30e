/**
 * Shared fixtures for pipeline tests: a scripted version control and
 * helpers that lay out static resources in a temporary project.
 */

import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { VcsChange, VersionControl } from '../../src/pipeline/vcs.js';

export const DESCRIPTOR_XML = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<StaticResource xmlns="http://soap.sforce.com/2006/04/metadata">',
  '    <cacheControl>Private</cacheControl>',
  '    <contentType>application/zip</contentType>',
  '</StaticResource>',
  '',
].join('\n');

export interface ChangedPathsCall {
  revisionA: string;
  revisionB: string;
  pathPrefix: string;
}

/**
 * In-process version control that reports a fixed list of changes
 */
export class FakeVersionControl implements VersionControl {
  readonly calls: ChangedPathsCall[] = [];
  private changes: VcsChange[];

  constructor(changes: VcsChange[] = []) {
    this.changes = changes;
  }

  setChanges(changes: VcsChange[]): void {
    this.changes = changes;
  }

  async changedPaths(revisionA: string, revisionB: string, pathPrefix: string): Promise<VcsChange[]> {
    this.calls.push({ revisionA, revisionB, pathPrefix });
    return this.changes.map((change) => ({ ...change }));
  }
}

export function changed(...paths: string[]): VcsChange[] {
  return paths.map((path) => ({ path, deleted: false }));
}

export function removed(...paths: string[]): VcsChange[] {
  return paths.map((path) => ({ path, deleted: true }));
}

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `srpack-${prefix}-`));
}

function writeFile(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}

export function writeDescriptor(sourceDir: string, name: string): void {
  writeFile(join(sourceDir, `${name}.resource-meta.xml`), DESCRIPTOR_XML);
}

/** Directory-backed resource; keys are paths relative to the unit dir */
export function writeDirectoryResource(
  sourceDir: string,
  name: string,
  files: Record<string, string>,
  withDescriptor = true
): void {
  mkdirSync(join(sourceDir, name), { recursive: true });
  for (const [relative, content] of Object.entries(files)) {
    writeFile(join(sourceDir, name, relative), content);
  }
  if (withDescriptor) writeDescriptor(sourceDir, name);
}

export function writeSingleResource(sourceDir: string, name: string, content: string, withDescriptor = true): void {
  writeFile(join(sourceDir, `${name}.resource`), content);
  if (withDescriptor) writeDescriptor(sourceDir, name);
}
