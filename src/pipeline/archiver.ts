/**
 * Zip archive writer for directory-backed static resources.
 *
 * Entries are added in sorted order with a fixed timestamp and mode, so the
 * same directory contents always produce the same bytes.
 */

import { createWriteStream, readdirSync, renameSync, rmSync, statSync } from 'node:fs';
import { join, posix } from 'node:path';
import { ZipFile } from 'yazl';

import { PARTIAL_SUFFIX } from './staging-area.js';

// ─── Constants ───────────────────────────────────────────

/** Timestamp written for every entry (zip dates start in 1980) */
export const ARCHIVE_ENTRY_MTIME = new Date(1980, 0, 1, 0, 0, 0);

const FILE_MODE = 0o100644;
const DIRECTORY_MODE = 0o40755;

// ─── Entry Collection ────────────────────────────────────

export interface ArchiveEntry {
  /** Path inside the archive, forward slashes */
  name: string;
  absolutePath: string;
  kind: 'file' | 'directory';
}

/**
 * List the entries of `rootDir` in archive order. Dot-entries directly under
 * the root are left out; empty directories get an entry of their own.
 */
export function collectArchiveEntries(rootDir: string): ArchiveEntry[] {
  const entries: ArchiveEntry[] = [];

  const walk = (dir: string, prefix: string): void => {
    const names = readdirSync(dir).sort();
    for (const name of names) {
      if (prefix === '' && name.startsWith('.')) continue;

      const absolutePath = join(dir, name);
      const entryName = prefix ? posix.join(prefix, name) : name;
      const stat = statSync(absolutePath);

      if (stat.isDirectory()) {
        if (readdirSync(absolutePath).length === 0) {
          entries.push({ name: `${entryName}/`, absolutePath, kind: 'directory' });
        } else {
          walk(absolutePath, entryName);
        }
      } else if (stat.isFile()) {
        entries.push({ name: entryName, absolutePath, kind: 'file' });
      }
    }
  };

  walk(rootDir, '');
  return entries;
}

// ─── Archive Writing ─────────────────────────────────────

/**
 * Compress the contents of `sourceDir` into `outFile`.
 * The archive is written to `<outFile>.partial` and renamed when complete.
 *
 * @returns Number of entries written
 */
export async function createZipArchive(sourceDir: string, outFile: string): Promise<number> {
  const entries = collectArchiveEntries(sourceDir);
  const partialFile = `${outFile}${PARTIAL_SUFFIX}`;

  try {
    await new Promise<void>((resolve, reject) => {
      const zip = new ZipFile();
      const output = createWriteStream(partialFile);

      zip.on('error', reject);
      zip.outputStream.on('error', reject);
      output.on('error', reject);
      output.on('close', () => resolve());

      zip.outputStream.pipe(output);

      for (const entry of entries) {
        if (entry.kind === 'directory') {
          zip.addEmptyDirectory(entry.name, { mtime: ARCHIVE_ENTRY_MTIME, mode: DIRECTORY_MODE });
        } else {
          zip.addFile(entry.absolutePath, entry.name, { mtime: ARCHIVE_ENTRY_MTIME, mode: FILE_MODE });
        }
      }
      zip.end();
    });
    renameSync(partialFile, outFile);
  } catch (error) {
    rmSync(partialFile, { force: true });
    throw error;
  }

  return entries.length;
}
