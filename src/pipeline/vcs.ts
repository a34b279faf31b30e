/**
 * Version-control collaborator — reports the paths changed between two
 * revisions. GitVersionControl shells out to git; tests supply their own.
 */

import { execFile } from 'node:child_process';

import { ExternalToolError } from './errors.js';

// ─── Constants ───────────────────────────────────────────

/** Max stdout capture for git commands */
const MAX_OUTPUT_SIZE = 64 * 1024 * 1024; // 64 MB

const GIT_TIMEOUT = 2 * 60 * 1000; // 2 minutes

// ─── Types ───────────────────────────────────────────────

export interface VcsChange {
  /** Path relative to the working directory, forward slashes */
  path: string;
  deleted: boolean;
}

export interface VersionControl {
  changedPaths(revisionA: string, revisionB: string, pathPrefix: string): Promise<VcsChange[]>;
}

// ─── Output Parsing ──────────────────────────────────────

/**
 * Parse `git diff --name-status -z` output.
 * Records are NUL-separated: status, then one path (two for renames/copies).
 */
export function parseNameStatus(output: string): VcsChange[] {
  const tokens = output.split('\0').filter((t) => t.length > 0);
  const changes: VcsChange[] = [];

  let i = 0;
  while (i < tokens.length) {
    const status = tokens[i++];
    const pathCount = status.startsWith('R') || status.startsWith('C') ? 2 : 1;
    if (i + pathCount > tokens.length) break;

    if (pathCount === 2) {
      const from = tokens[i++];
      const to = tokens[i++];
      if (status.startsWith('R')) {
        changes.push({ path: from, deleted: true });
      }
      changes.push({ path: to, deleted: false });
    } else {
      changes.push({ path: tokens[i++], deleted: status.startsWith('D') });
    }
  }

  return changes;
}

// ─── Git Implementation ──────────────────────────────────

export interface GitVersionControlOptions {
  repoDir: string;
  gitBinary?: string;
}

export class GitVersionControl implements VersionControl {
  private readonly repoDir: string;
  private readonly gitBinary: string;

  constructor(options: GitVersionControlOptions) {
    this.repoDir = options.repoDir;
    this.gitBinary = options.gitBinary ?? 'git';
  }

  async changedPaths(revisionA: string, revisionB: string, pathPrefix: string): Promise<VcsChange[]> {
    // Paths and pathspec relative to repoDir, which may sit below the work tree root
    const args = ['diff', '--name-status', '--no-renames', '--relative', '-z', revisionA, revisionB, '--', pathPrefix];
    try {
      const stdout = await this.run(args);
      return parseNameStatus(stdout);
    } catch (error) {
      throw new ExternalToolError(`git diff ${revisionA} ${revisionB}`, 'diff', null, error);
    }
  }

  /** True when repoDir is inside a git work tree */
  async isWorkTree(): Promise<boolean> {
    try {
      const stdout = await this.run(['rev-parse', '--is-inside-work-tree']);
      return stdout.trim() === 'true';
    } catch {
      return false;
    }
  }

  /** `git --version` output, or null when git cannot be run */
  async version(): Promise<string | null> {
    try {
      return (await this.run(['--version'])).trim();
    } catch {
      return null;
    }
  }

  private run(args: string[]): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      execFile(
        this.gitBinary,
        args,
        { cwd: this.repoDir, maxBuffer: MAX_OUTPUT_SIZE, timeout: GIT_TIMEOUT },
        (error, stdout, stderr) => {
          if (error) {
            const detail = String(stderr).trim();
            reject(detail ? new Error(detail) : error);
            return;
          }
          resolve(String(stdout));
        },
      );
    });
  }
}
