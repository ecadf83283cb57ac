/**
 * fileService.ts — Local file collection and upload target resolution.
 *
 * Turns the path given on the command line into the immutable list of
 * UploadTargets the engine works on:
 *
 *   collectFiles(root)              → sorted absolute paths (hidden entries skipped)
 *   resolveUploadTargets(files, root) → [{ path, key, size }]
 *
 * Logical keys:
 *   - root is a directory → path relative to the root, '/'-separated
 *     (e.g., "raw/2024/run-1.csv")
 *   - root is a file      → the bare filename
 *   - a file outside the root falls back to its bare filename
 *
 * Zero-byte files are rejected here, before any network call, so a draft is
 * never created for a batch that cannot be uploaded.
 *
 * zipDirectory() packs a directory into a single archive in the OS temp
 * directory, for directories with more files than a draft accepts.
 */
import fs from 'fs';
import os from 'os';
import path from 'path';
import { pipeline } from 'stream/promises';
import JSZip from 'jszip';
import type { UploadTarget } from '../shared';
import { LIMITS } from '../shared';
import { EmptyFileError, FileAccessError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

const IGNORED_NAMES: readonly string[] = LIMITS.IGNORED_NAMES;

function isIgnored(name: string): boolean {
  return name.startsWith('.') || IGNORED_NAMES.includes(name);
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Collection ───────────────────────────────────────────────────

/**
 * Collects every regular file under `root`.
 * A file root yields itself; a missing path yields an empty list.
 */
export async function collectFiles(root: string): Promise<string[]> {
  const absolute = path.resolve(root);
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(absolute);
  } catch {
    return [];
  }

  if (stats.isFile()) return [absolute];
  if (!stats.isDirectory()) return [];

  const files: string[] = [];
  await walk(absolute, files);
  return sortByComponents(files, absolute);
}

/**
 * Symlinked files are followed; symlinked directories are not descended
 * into, so a link back to an ancestor cannot loop.
 */
async function walk(dir: string, out: string[]): Promise<void> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (isIgnored(entry.name)) continue;
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(full, out);
    } else if (entry.isFile()) {
      out.push(full);
    } else if (entry.isSymbolicLink() && (await isLinkToFile(full))) {
      out.push(full);
    }
  }
}

async function isLinkToFile(link: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(link)).isFile();
  } catch (err) {
    logger.warn(`Skipping broken symbolic link ${link}`, { error: describeError(err) });
    return false;
  }
}

/** Orders by path segments, so "a/x" comes before "a-b/x" */
function sortByComponents(files: string[], root: string): string[] {
  const segments = new Map(files.map((file) => [file, path.relative(root, file).split(path.sep)]));
  const compare = (a: string[], b: string[]): number => {
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
      if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
    }
    return a.length - b.length;
  };
  return [...files].sort((a, b) => compare(segments.get(a) ?? [], segments.get(b) ?? []));
}

// ─── Targets ──────────────────────────────────────────────────────

export function logicalKey(filePath: string, root: string, rootIsFile: boolean): string {
  if (rootIsFile) return path.basename(filePath);

  const relative = path.relative(path.resolve(root), path.resolve(filePath));
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return path.basename(filePath);
  }
  return relative.split(path.sep).join('/');
}

/**
 * Stats every file once and derives its logical key.
 * @throws FileAccessError when a file is missing or not a regular file
 * @throws EmptyFileError for zero-byte files
 * @throws ValidationError when two files map to the same key
 */
export async function resolveUploadTargets(
  files: readonly string[],
  root: string,
): Promise<UploadTarget[]> {
  const rootStats = await statOrFail(path.resolve(root));
  const rootIsFile = rootStats.isFile();

  const seenPaths = new Set<string>();
  const seenKeys = new Map<string, string>();
  const targets: UploadTarget[] = [];

  for (const file of files) {
    const absolute = path.resolve(file);
    if (seenPaths.has(absolute)) continue;
    seenPaths.add(absolute);

    const stats = await statOrFail(absolute);
    if (!stats.isFile()) {
      throw new FileAccessError(absolute, 'not a regular file');
    }
    if (stats.size === 0) {
      throw new EmptyFileError(absolute);
    }

    const key = logicalKey(absolute, root, rootIsFile);
    const existing = seenKeys.get(key);
    if (existing) {
      throw new ValidationError(`${existing} and ${absolute} would both be uploaded as "${key}"`);
    }
    seenKeys.set(key, absolute);

    targets.push({ path: absolute, key, size: stats.size });
  }

  return targets;
}

async function statOrFail(target: string): Promise<fs.Stats> {
  try {
    return await fs.promises.stat(target);
  } catch (err) {
    throw new FileAccessError(target, describeError(err));
  }
}

// ─── Archives ─────────────────────────────────────────────────────

/**
 * Zips a directory into `<tmpdir>/<outputName>.zip`, replacing any archive
 * of the same name. Entries keep their paths relative to the directory.
 * @returns Absolute path of the archive; the caller removes it after upload
 */
export async function zipDirectory(directory: string, outputName?: string): Promise<string> {
  const absolute = path.resolve(directory);
  const stats = await statOrFail(absolute);
  if (!stats.isDirectory()) {
    throw new ValidationError(`Path ${absolute} is not a directory`);
  }

  const zipPath = path.join(os.tmpdir(), `${outputName ?? path.basename(absolute)}.zip`);
  await fs.promises.rm(zipPath, { force: true });

  const files = await collectFiles(absolute);
  logger.info(`Zipping ${files.length} files from ${path.basename(absolute)}`);

  const zip = new JSZip();
  for (const file of files) {
    zip.file(logicalKey(file, absolute, false), fs.createReadStream(file));
  }

  let lastReported = -1;
  const archive = zip.generateNodeStream(
    { type: 'nodebuffer', streamFiles: true, compression: 'DEFLATE' },
    (metadata) => {
      const percent = Math.floor(metadata.percent / 10) * 10;
      if (percent > lastReported) {
        lastReported = percent;
        logger.debug(`Zipping: ${percent}%`);
      }
    },
  );
  await pipeline(archive, fs.createWriteStream(zipPath));

  const { size } = await fs.promises.stat(zipPath);
  logger.info(`Created zip file ${path.basename(zipPath)} (${formatSize(size)})`);
  return zipPath;
}

// ─── Formatting ───────────────────────────────────────────────────

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/** 1024-based, one decimal: 0 → "0.0 B", 1536 → "1.5 KB" */
export function formatSize(bytes: number): string {
  let value = bytes;
  for (const unit of SIZE_UNITS) {
    if (value < 1024) return `${value.toFixed(1)} ${unit}`;
    value /= 1024;
  }
  return `${value.toFixed(1)} PB`;
}
