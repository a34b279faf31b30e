/**
 * Pipeline orchestrator tests — end-to-end runs against temporary projects
 * and a scripted version control.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { DEFAULT_CONFIG, type Config } from '../../src/config/index.js';
import { AssemblyError, ConflictError, UsageError } from '../../src/pipeline/errors.js';
import { resolveLayout, type ResourceLayout } from '../../src/pipeline/layout.js';
import { planRun, resolveRunMode, runPipeline } from '../../src/pipeline/orchestrator.js';
import { RunLogger } from '../../src/pipeline/run-logger.js';
import {
  FakeVersionControl,
  changed,
  makeTempDir,
  removed,
  writeDescriptor,
  writeDirectoryResource,
  writeSingleResource,
} from './fixtures.js';

/** File name → base64 contents */
function readTree(dir: string): Record<string, string> {
  const tree: Record<string, string> = {};
  for (const name of readdirSync(dir).sort()) {
    tree[name] = readFileSync(join(dir, name)).toString('base64');
  }
  return tree;
}

describe('Pipeline orchestrator', () => {
  let projectDir: string;
  let stageBase: string;
  let config: Config;
  let layout: ResourceLayout;
  let vcs: FakeVersionControl;

  beforeEach(() => {
    projectDir = makeTempDir('project');
    stageBase = makeTempDir('stage');
    config = {
      ...DEFAULT_CONFIG,
      staging: { base_dir: stageBase },
      output: { ...DEFAULT_CONFIG.output, log_to_file: false },
    };
    layout = resolveLayout(projectDir, config);
    vcs = new FakeVersionControl();
  });

  afterEach(() => {
    rmSync(projectDir, { recursive: true, force: true });
    rmSync(stageBase, { recursive: true, force: true });
  });

  function run(revisionA: string, revisionB: string | null, target = 'uat') {
    return runPipeline({ projectDir, revisionA, revisionB, target, config, vcs });
  }

  describe('resolveRunMode', () => {
    it('should select a full snapshot for the sentinel only', () => {
      expect(resolveRunMode('FD', config)).toBe('FullSnapshot');
      expect(resolveRunMode('fd', config)).toBe('RevisionRange');
      expect(resolveRunMode('abc123', config)).toBe('RevisionRange');
    });
  });

  it('should package a directory and a single file from a revision range', async () => {
    writeDirectoryResource(layout.sourceDir, 'Bundle', { 'index.html': '<p></p>', 'js/app.js': 'x' });
    writeSingleResource(layout.sourceDir, 'Logo', 'png-bytes');
    vcs.setChanges(changed('src/staticresources/Bundle/js/app.js', 'src/staticresources/Logo.resource'));

    const report = await run('abc', 'def');

    expect(report.mode).toBe('RevisionRange');
    expect(report.units).toEqual([
      {
        name: 'Bundle',
        representation: 'DirectoryBacked',
        hasDescriptor: true,
        status: 'staged',
        artifacts: ['Bundle.resource-meta.xml', 'Bundle.zip'],
      },
      {
        name: 'Logo',
        representation: 'SingleFileBacked',
        hasDescriptor: true,
        status: 'staged',
        artifacts: ['Logo.resource', 'Logo.resource-meta.xml'],
      },
    ]);
    expect(report.promoted).toEqual([
      'Bundle.resource',
      'Logo.resource',
      'Bundle.resource-meta.xml',
      'Logo.resource-meta.xml',
    ]);
    expect(readdirSync(layout.deployDir).sort()).toEqual([
      'Bundle.resource',
      'Bundle.resource-meta.xml',
      'Logo.resource',
      'Logo.resource-meta.xml',
    ]);
    expect(readFileSync(join(layout.deployDir, 'Logo.resource'), 'utf-8')).toBe('png-bytes');
  });

  it('should produce identical deploy contents when run twice', async () => {
    writeDirectoryResource(layout.sourceDir, 'Bundle', { 'index.html': '<p></p>', 'css/site.css': 'body{}' });
    writeSingleResource(layout.sourceDir, 'Logo', 'png-bytes');
    vcs.setChanges(changed('src/staticresources/Bundle/index.html', 'src/staticresources/Logo.resource'));

    await run('abc', 'def');
    const first = readTree(layout.deployDir);
    await run('abc', 'def');
    const second = readTree(layout.deployDir);

    expect(Object.keys(first)).toEqual([
      'Bundle.resource',
      'Bundle.resource-meta.xml',
      'Logo.resource',
      'Logo.resource-meta.xml',
    ]);
    expect(second).toEqual(first);
  });

  it('should abort on a unit with two representations before writing anything', async () => {
    writeDirectoryResource(layout.sourceDir, 'Both', { 'a.js': 'a' });
    writeSingleResource(layout.sourceDir, 'Both', 'b', false);
    writeSingleResource(layout.sourceDir, 'Logo', 'png');
    vcs.setChanges(changed('src/staticresources/Both/a.js', 'src/staticresources/Logo.resource'));

    await expect(run('abc', 'def')).rejects.toMatchObject({
      name: 'ConflictError',
      message: 'Conflicting static resources: Both',
    });
    expect(existsSync(layout.deployDir)).toBe(false);
    expect(readdirSync(join(stageBase, 'uat.StaticResource'))).toEqual([]);
  });

  it('should resolve a descriptor-only change from the source tree', async () => {
    writeDirectoryResource(layout.sourceDir, 'Bundle', { 'index.html': '<p></p>' });
    vcs.setChanges(changed('src/staticresources/Bundle.resource-meta.xml'));

    const report = await run('abc', 'def');

    expect(report.units.map((u) => [u.name, u.representation, u.status])).toEqual([
      ['Bundle', 'DirectoryBacked', 'staged'],
    ]);
    expect(readdirSync(layout.deployDir).sort()).toEqual(['Bundle.resource', 'Bundle.resource-meta.xml']);
  });

  it('should reject a descriptor with no content', async () => {
    writeDescriptor(layout.sourceDir, 'Orphan');
    vcs.setChanges(changed('src/staticresources/Orphan.resource-meta.xml'));

    const promise = run('abc', 'def');

    await expect(promise).rejects.toBeInstanceOf(ConflictError);
    await expect(promise).rejects.toMatchObject({ conflicts: [{ unitName: 'Orphan', rule: 'unresolved' }] });
  });

  it('should stop in validation when a packaged unit has lost its descriptor', async () => {
    writeSingleResource(layout.sourceDir, 'Alpha', 'a');
    writeDirectoryResource(layout.sourceDir, 'Bundle', { 'index.html': '<p></p>' }, false);
    vcs.setChanges([
      ...changed('src/staticresources/Alpha.resource'),
      ...removed('src/staticresources/Bundle.resource-meta.xml'),
    ]);

    let caught: unknown;
    try {
      await run('abc', 'def');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConflictError);
    if (!(caught instanceof ConflictError)) return;
    expect(caught.phase).toBe('validate');
    expect(caught.conflicts.map((c) => [c.unitName, c.rule])).toEqual([['Bundle', 'missing-descriptor']]);
    expect(readdirSync(join(stageBase, 'uat.StaticResource'))).toEqual([]);
    expect(existsSync(layout.deployDir)).toBe(false);
  });

  it('should package every resource in full snapshot mode without asking version control', async () => {
    writeDirectoryResource(layout.sourceDir, 'Bundle', { 'index.html': '<p></p>' });
    writeSingleResource(layout.sourceDir, 'Logo', 'png');
    writeSingleResource(layout.sourceDir, 'Font', 'woff');

    const report = await run('FD', 'HEAD');

    expect(report.mode).toBe('FullSnapshot');
    expect(vcs.calls).toEqual([]);
    expect(report.units.map((u) => u.name)).toEqual(['Bundle', 'Font', 'Logo']);
    expect(readdirSync(layout.deployDir).sort()).toEqual([
      'Bundle.resource',
      'Bundle.resource-meta.xml',
      'Font.resource',
      'Font.resource-meta.xml',
      'Logo.resource',
      'Logo.resource-meta.xml',
    ]);
  });

  it('should promote nothing when one unit fails, and recover on the next run', async () => {
    writeSingleResource(layout.sourceDir, 'Alpha', 'a');
    writeSingleResource(layout.sourceDir, 'Beta', 'b');
    writeDescriptor(layout.sourceDir, 'Gamma');
    vcs.setChanges(changed(
      'src/staticresources/Alpha.resource',
      'src/staticresources/Beta.resource',
      'src/staticresources/Gamma/main.js'
    ));

    let caught: unknown;
    try {
      await run('abc', 'def');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AssemblyError);
    if (!(caught instanceof AssemblyError)) return;
    expect(caught.failures.map((f) => f.unitName)).toEqual(['Gamma']);
    expect(caught.diagnostics()).toEqual([
      `[assemble] Gamma: source not found at ${join(layout.sourceDir, 'Gamma')}`,
    ]);
    expect(existsSync(layout.deployDir)).toBe(false);

    writeDirectoryResource(layout.sourceDir, 'Gamma', { 'main.js': 'g' }, false);
    const report = await run('abc', 'def');

    expect(report.units.map((u) => [u.name, u.status])).toEqual([
      ['Alpha', 'staged'],
      ['Beta', 'staged'],
      ['Gamma', 'staged'],
    ]);
    expect(readdirSync(layout.deployDir)).toHaveLength(6);
  });

  it('should leave unrelated files in the deploy dir untouched', async () => {
    mkdirSync(layout.deployDir, { recursive: true });
    writeFileSync(join(layout.deployDir, 'Legacy.resource'), 'legacy');
    writeFileSync(join(layout.deployDir, 'Legacy.resource-meta.xml'), '<legacy/>');
    writeSingleResource(layout.sourceDir, 'Logo', 'png');
    vcs.setChanges(changed('src/staticresources/Logo.resource'));

    await run('abc', 'def');

    expect(readdirSync(layout.deployDir).sort()).toEqual([
      'Legacy.resource',
      'Legacy.resource-meta.xml',
      'Logo.resource',
      'Logo.resource-meta.xml',
    ]);
    expect(readFileSync(join(layout.deployDir, 'Legacy.resource'), 'utf-8')).toBe('legacy');
  });

  it('should report deleted units and ignored paths without packaging them', async () => {
    writeSingleResource(layout.sourceDir, 'Logo', 'png');
    vcs.setChanges([
      ...changed('src/staticresources/Logo.resource', 'src/staticresources/notes.txt'),
      ...removed('src/staticresources/Old.resource', 'src/staticresources/Old.resource-meta.xml'),
    ]);

    const report = await run('abc', 'def');

    expect(report.units.map((u) => [u.name, u.status, u.artifacts])).toEqual([
      ['Logo', 'staged', ['Logo.resource', 'Logo.resource-meta.xml']],
      ['Old', 'removed', []],
    ]);
    expect(report.ignoredPaths).toEqual(['src/staticresources/notes.txt']);
    expect(readdirSync(layout.deployDir).sort()).toEqual(['Logo.resource', 'Logo.resource-meta.xml']);
  });

  it('should drain the staging area after promotion', async () => {
    writeSingleResource(layout.sourceDir, 'Logo', 'png');
    vcs.setChanges(changed('src/staticresources/Logo.resource'));

    const report = await run('abc', 'def', 'prod');

    expect(report.stagingDir).toBe(join(stageBase, 'prod.StaticResource'));
    expect(readdirSync(join(stageBase, 'prod.StaticResource'))).toEqual([]);
  });

  it('should require a second revision in range mode', async () => {
    await expect(run('abc', null)).rejects.toBeInstanceOf(UsageError);
  });

  it('should reject an unusable target label', async () => {
    await expect(run('abc', 'def', '../prod')).rejects.toBeInstanceOf(UsageError);
  });

  it('should record failures in the run logger', async () => {
    writeDescriptor(layout.sourceDir, 'Orphan');
    vcs.setChanges(changed('src/staticresources/Orphan.resource-meta.xml'));
    const logger = new RunLogger({ logFile: null });

    await expect(runPipeline({
      projectDir, revisionA: 'abc', revisionB: 'def', target: 'uat', config, vcs, logger,
    })).rejects.toBeInstanceOf(ConflictError);

    expect(logger.getErrors().map((e) => [e.stage, e.message])).toEqual([
      [
        'validate',
        `[validate] Orphan: descriptor has no Orphan/ directory or Orphan.resource file at ${layout.sourceDir}`,
      ],
    ]);
  });

  describe('planRun', () => {
    it('should list planned units without touching staging or deploy dirs', async () => {
      writeDirectoryResource(layout.sourceDir, 'Bundle', { 'index.html': '<p></p>' });
      vcs.setChanges(changed('src/staticresources/Bundle/index.html'));

      const report = await planRun({ projectDir, revisionA: 'abc', revisionB: 'def', config, vcs });

      expect(report.stagingDir).toBeNull();
      expect(report.units).toEqual([
        {
          name: 'Bundle',
          representation: 'DirectoryBacked',
          hasDescriptor: true,
          status: 'planned',
          artifacts: ['Bundle.resource', 'Bundle.resource-meta.xml'],
        },
      ]);
      expect(existsSync(layout.deployDir)).toBe(false);
      expect(readdirSync(stageBase)).toEqual([]);
    });

    it('should accept a full snapshot without a second revision', async () => {
      writeSingleResource(layout.sourceDir, 'Logo', 'png');

      const report = await planRun({ projectDir, revisionA: 'FD', revisionB: null, config, vcs });

      expect(report.mode).toBe('FullSnapshot');
      expect(report.units.map((u) => u.name)).toEqual(['Logo']);
    });

    it('should fail on conflicts', async () => {
      writeDescriptor(layout.sourceDir, 'Orphan');
      vcs.setChanges(changed('src/staticresources/Orphan.resource-meta.xml'));

      await expect(planRun({ projectDir, revisionA: 'abc', revisionB: 'def', config, vcs }))
        .rejects.toBeInstanceOf(ConflictError);
    });
  });
});
