import * as fs from 'fs';
import * as path from 'path';
import { describeError, type UnreadableEntry } from './errors';
import type { Log } from './logger';
import type { Spinner } from './progress';
import type { RunState } from './runState';

export interface TraverseOptions {
  log: Log;
  /** Called with the file name; only matching files are stat'ed and reported. */
  filter?: (fileName: string) => boolean;
  /** Absolute directories that are not entered. */
  excludeDirs?: string[];
  onUnreadable?: (entry: UnreadableEntry) => void;
  runState?: RunState;
  spinner?: Spinner;
}

/**
 * Compares two strings by UTF-16 code units, independent of locale,
 * so sorted paths come out the same on every machine.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Gets the size of a file in bytes.
 * @param filePath - The path to the file.
 */
export function getFileSize(filePath: string): number {
  return fs.statSync(filePath).size;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function reportUnreadable(itemPath: string, error: unknown, options: TraverseOptions): void {
  const entry = { path: itemPath, reason: describeError(error) };
  options.log.warning(`Skipping unreadable entry ${entry.path}: ${entry.reason}`);
  options.onUnreadable?.(entry);
}

/**
 * Recursively walks a directory and calls `callback` for every regular file,
 * including symlinks that resolve to one. Entries are visited in name order.
 * Directories that cannot be read and files that cannot be stat'ed are
 * reported through `onUnreadable` and skipped; symlinked directories are not
 * followed.
 *
 * @param dirPath The directory to traverse
 * @param callback Function called for each file found
 * @param options Filtering, exclusions and progress reporting
 */
export function traverseDirectory(
  dirPath: string,
  callback: (filePath: string, stat: fs.Stats) => void,
  options: TraverseOptions
): void {
  options.runState?.validate();
  options.spinner?.update(`Indexing: ${dirPath}`);

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch (error) {
    reportUnreadable(dirPath, error, options);
    return;
  }

  entries.sort((a, b) => compareStrings(a.name, b.name));
  const excluded = (options.excludeDirs ?? []).map(dir => path.resolve(dir));

  for (const entry of entries) {
    const fullPath = path.join(dirPath, entry.name);

    if (entry.isDirectory()) {
      if (excluded.includes(path.resolve(fullPath))) {
        options.log.debug(`Skipping excluded directory ${fullPath}`);
        continue;
      }
      traverseDirectory(fullPath, callback, options);
      continue;
    }

    if (!entry.isFile() && !entry.isSymbolicLink()) continue;
    if (options.filter && !options.filter(entry.name)) continue;

    let stat: fs.Stats;
    try {
      stat = fs.statSync(fullPath);
    } catch (error) {
      reportUnreadable(fullPath, error, options);
      continue;
    }

    if (stat.isFile()) {
      callback(fullPath, stat);
    } else if (stat.isDirectory()) {
      options.log.debug(`Not following symlinked directory ${fullPath}`);
    }
  }
}

/**
 * Moves a file, creating the destination directory. Falls back to copy and
 * delete when source and destination are on different devices.
 */
export function moveFile(sourcePath: string, destinationPath: string): void {
  fs.mkdirSync(path.dirname(destinationPath), { recursive: true });
  try {
    fs.renameSync(sourcePath, destinationPath);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') {
      throw error;
    }
    fs.copyFileSync(sourcePath, destinationPath);
    fs.unlinkSync(sourcePath);
  }
}

/**
 * Deletes a file if it exists.
 * @param filePath - The path to the file to delete.
 */
export function deleteFile(filePath: string): void {
  fs.rmSync(filePath, { force: true });
}

/**
 * True when `childPath` is `parentPath` itself or lies somewhere below it.
 */
export function isInsideDirectory(parentPath: string, childPath: string): boolean {
  const relative = path.relative(path.resolve(parentPath), path.resolve(childPath));
  return relative === ''
    || (relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
}
