/**
 * Output Store - rendered layout files and their archived versions
 *
 * Before new outputs are written, the current ones are copied into
 * `<outputDir>/versions/` with a timestamp suffix. Only the newest
 * versions are kept; an SVG version and its .txt companion go together.
 */

import { copyFile, mkdir, readdir, stat, unlink, utimes, writeFile } from 'fs/promises';
import { join, parse } from 'path';
import {
  DEFAULT_MAX_VERSIONS,
  DEFAULT_OUTPUT_PREFIX,
  VERSIONS_DIR
} from '../algorithm/constants';
import { Logger } from '../algorithm/utils/logger';

const ARCHIVED_EXTENSIONS = ['.svg', '.txt'];

export interface ArchiveOptions {
  /** Only files whose name starts with this are archived */
  prefix?: string;
  /** SVG versions to keep */
  maxVersions?: number;
  /** Timestamp for the archived names (defaults to now) */
  now?: Date;
}

export interface ArchiveResult {
  /** File names created under versions/ */
  archived: string[];
  /** File names deleted from versions/ */
  removed: string[];
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

async function listFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries.filter(e => e.isFile()).map(e => e.name).sort();
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    // fs errors are not always instances of this realm's Error
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Copy current outputs into versions/ and prune old versions.
 */
export async function archiveOutputs(outputDir: string, options: ArchiveOptions = {}): Promise<ArchiveResult> {
  const {
    prefix = DEFAULT_OUTPUT_PREFIX,
    maxVersions = DEFAULT_MAX_VERSIONS,
    now = new Date()
  } = options;

  const versionsDir = join(outputDir, VERSIONS_DIR);
  await mkdir(versionsDir, { recursive: true });

  const timestamp = formatTimestamp(now);
  const archived: string[] = [];

  for (const name of await listFiles(outputDir)) {
    const { name: stem, ext } = parse(name);
    if (!name.startsWith(prefix) || !ARCHIVED_EXTENSIONS.includes(ext)) continue;

    const source = join(outputDir, name);
    const archivedName = `${stem}_${timestamp}${ext}`;
    const dest = join(versionsDir, archivedName);
    await copyFile(source, dest);
    // Keep the original modification time so pruning orders by when the output was made
    const { atime, mtime } = await stat(source);
    await utimes(dest, atime, mtime);
    archived.push(archivedName);
  }

  if (archived.length > 0) {
    Logger.info(`Archived ${archived.length} files to ${VERSIONS_DIR}/`);
  }

  const removed = await pruneVersions(versionsDir, maxVersions);
  return { archived, removed };
}

/**
 * Delete all but the newest `maxVersions` SVG versions, with their .txt companions.
 * Ordered by modification time, then name.
 */
export async function pruneVersions(versionsDir: string, maxVersions: number): Promise<string[]> {
  const svgNames = (await listFiles(versionsDir)).filter(name => name.endsWith('.svg'));
  if (svgNames.length <= maxVersions) {
    return [];
  }

  const withTimes = await Promise.all(
    svgNames.map(async name => ({ name, mtime: (await stat(join(versionsDir, name))).mtimeMs }))
  );
  withTimes.sort((a, b) => a.mtime - b.mtime || a.name.localeCompare(b.name));

  const removed: string[] = [];
  for (const { name } of withTimes.slice(0, withTimes.length - maxVersions)) {
    await unlink(join(versionsDir, name));
    removed.push(name);

    const companion = `${parse(name).name}.txt`;
    const companionPath = join(versionsDir, companion);
    if (await exists(companionPath)) {
      await unlink(companionPath);
      removed.push(companion);
    }
  }

  Logger.info(`Cleaned up ${withTimes.length - maxVersions} old versions (keeping last ${maxVersions})`);
  return removed;
}

/**
 * Write one output file, creating the directory if needed. Returns the path written.
 */
export async function writeOutput(outputDir: string, fileName: string, content: string): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const path = join(outputDir, fileName);
  await writeFile(path, content, 'utf8');
  Logger.info(`Wrote ${path}`);
  return path;
}
