/**
 * Version control tests — name-status parsing and the git adapter.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

const { execFileMock } = vi.hoisted(() => ({ execFileMock: vi.fn() }));

vi.mock('node:child_process', () => ({ execFile: execFileMock }));

import { ExternalToolError } from '../../src/pipeline/errors.js';
import { GitVersionControl, parseNameStatus } from '../../src/pipeline/vcs.js';

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

function respondWith(stdout: string, stderr = '', error: Error | null = null): void {
  execFileMock.mockImplementation(
    (_file: string, _args: string[], _options: object, callback: ExecCallback) => {
      callback(error, stdout, stderr);
    }
  );
}

describe('parseNameStatus', () => {
  it('should parse modified, added and deleted records', () => {
    const output = 'M\0src/staticresources/A/app.js\0A\0src/staticresources/B.resource\0D\0src/staticresources/C.resource-meta.xml\0';
    expect(parseNameStatus(output)).toEqual([
      { path: 'src/staticresources/A/app.js', deleted: false },
      { path: 'src/staticresources/B.resource', deleted: false },
      { path: 'src/staticresources/C.resource-meta.xml', deleted: true },
    ]);
  });

  it('should split a rename into a deletion and an addition', () => {
    const output = 'R100\0src/staticresources/Old.resource\0src/staticresources/New.resource\0';
    expect(parseNameStatus(output)).toEqual([
      { path: 'src/staticresources/Old.resource', deleted: true },
      { path: 'src/staticresources/New.resource', deleted: false },
    ]);
  });

  it('should keep only the destination of a copy', () => {
    const output = 'C75\0src/staticresources/A.resource\0src/staticresources/B.resource\0';
    expect(parseNameStatus(output)).toEqual([
      { path: 'src/staticresources/B.resource', deleted: false },
    ]);
  });

  it('should return nothing for empty output', () => {
    expect(parseNameStatus('')).toEqual([]);
  });

  it('should drop a truncated trailing record', () => {
    expect(parseNameStatus('M\0a.resource\0R090\0b.resource\0')).toEqual([
      { path: 'a.resource', deleted: false },
    ]);
  });
});

describe('GitVersionControl', () => {
  beforeEach(() => {
    execFileMock.mockReset();
  });

  it('should run git diff restricted to the prefix', async () => {
    respondWith('M\0src/staticresources/Logo.resource\0');
    const vcs = new GitVersionControl({ repoDir: '/repo' });

    const changes = await vcs.changedPaths('abc123', 'def456', 'src');

    expect(changes).toEqual([{ path: 'src/staticresources/Logo.resource', deleted: false }]);
    expect(execFileMock).toHaveBeenCalledWith(
      'git',
      ['diff', '--name-status', '--no-renames', '--relative', '-z', 'abc123', 'def456', '--', 'src'],
      expect.objectContaining({ cwd: '/repo' }),
      expect.any(Function)
    );
  });

  it('should use the configured git binary', async () => {
    respondWith('');
    const vcs = new GitVersionControl({ repoDir: '/repo', gitBinary: '/opt/git/bin/git' });

    await vcs.changedPaths('a', 'b', 'src');

    expect(execFileMock.mock.calls[0]?.[0]).toBe('/opt/git/bin/git');
  });

  it('should wrap git failures with the stderr text', async () => {
    respondWith('', "fatal: bad revision 'nope'\n", new Error('Command failed'));
    const vcs = new GitVersionControl({ repoDir: '/repo' });

    const promise = vcs.changedPaths('nope', 'HEAD', 'src');

    await expect(promise).rejects.toBeInstanceOf(ExternalToolError);
    await expect(promise).rejects.toMatchObject({
      phase: 'diff',
      message: "git diff nope HEAD failed: fatal: bad revision 'nope'",
    });
  });

  it('should report a work tree', async () => {
    respondWith('true\n');
    expect(await new GitVersionControl({ repoDir: '/repo' }).isWorkTree()).toBe(true);
  });

  it('should report no work tree when git fails', async () => {
    respondWith('', 'fatal: not a git repository', new Error('Command failed'));
    expect(await new GitVersionControl({ repoDir: '/repo' }).isWorkTree()).toBe(false);
  });

  it('should return the git version or null', async () => {
    respondWith('git version 2.43.0\n');
    expect(await new GitVersionControl({ repoDir: '/repo' }).version()).toBe('git version 2.43.0');

    respondWith('', '', new Error('spawn git ENOENT'));
    expect(await new GitVersionControl({ repoDir: '/repo' }).version()).toBeNull();
  });
});
