import * as fs from 'fs';
import * as path from 'path';
import { getArchiveDirectories, getArchivePath, getOutputPath } from '../utils/audio';
import { ConversionFailedError, describeError } from '../utils/errors';
import { deleteFile, getFileSize, moveFile } from '../utils/file';
import { readableFileSize } from '../utils/format';
import { loadIndex } from '../utils/indexCache';
import {
  assertReadableDirectory,
  scanLibrary,
  selectTracks,
  type LibraryScan,
  type TrackFile
} from '../utils/library';
import type { Log } from '../utils/logger';
import { ProgressBar, type Spinner } from '../utils/progress';
import { promptForArtists } from '../utils/prompt';
import type { RunState } from '../utils/runState';
import { writeScriptResults } from '../utils/script';
import type { Transcoder } from '../utils/transcoder';

export type ConversionStatus = 'converted' | 'failed' | 'skipped' | 'planned';

export interface ConversionResult {
  track: TrackFile;
  outputPath: string;
  status: ConversionStatus;
  originalSize: number;
  /** Size of the written MP3, or the projected size for a planned conversion. */
  resultSize?: number;
  archivedTo?: string;
  error?: string;
}

export interface ConversionSummary {
  converted: number;
  failed: number;
  skipped: number;
  planned: number;
  originalBytes: number;
  resultBytes: number;
  savedBytes: number;
}

export interface ProcessOptions {
  log: Log;
  transcoder: Transcoder;
  dryRun: boolean;
  libraryRoot: string;
  /** Converted originals are moved below this directory unless `keepOriginals` is set. */
  archiveRoot: string;
  keepOriginals?: boolean;
  overwrite?: boolean;
  runState?: RunState;
  progressBar?: ProgressBar;
}

export interface ConvertOptions {
  log: Log;
  transcoder: Transcoder;
  dryRun: boolean;
  artists?: string[];
  interactive?: boolean;
  artistDepth?: number;
  archiveDir?: string;
  keepOriginals?: boolean;
  overwrite?: boolean;
  /** Saved index to use instead of scanning the library. */
  indexFile?: string;
  /** Where the results JSON is written after a real run. */
  outputDir?: string;
  runState?: RunState;
  spinner?: Spinner;
  showProgress?: boolean;
  promptArtists?: (artists: string[]) => Promise<string[]>;
}

export interface ConversionRun {
  selection: TrackFile[];
  missingArtists: string[];
  results: ConversionResult[];
  summary: ConversionSummary;
}

export function summarizeResults(results: ConversionResult[]): ConversionSummary {
  const summary: ConversionSummary = {
    converted: 0,
    failed: 0,
    skipped: 0,
    planned: 0,
    originalBytes: 0,
    resultBytes: 0,
    savedBytes: 0,
  };

  for (const result of results) {
    summary[result.status]++;
    if (result.status === 'skipped') continue;

    summary.originalBytes += result.originalSize;
    if (result.resultSize !== undefined) {
      summary.resultBytes += result.resultSize;
      summary.savedBytes += result.originalSize - result.resultSize;
    }
  }

  return summary;
}

async function projectOutputSize(track: TrackFile, options: ProcessOptions): Promise<number | undefined> {
  try {
    const size = await options.transcoder.estimateOutputSize(track.path);
    if (size === undefined) {
      options.log.warning(`Could not determine the duration of ${track.path}; projected size unknown`);
    }
    return size;
  } catch (error) {
    options.log.warning(`Could not probe ${track.path}: ${describeError(error)}`);
    return undefined;
  }
}

function archiveOriginal(track: TrackFile, archivePath: string, log: Log): string | undefined {
  try {
    moveFile(track.path, archivePath);
    log.info(`Moved ${track.path} to ${archivePath}`);
    return archivePath;
  } catch (error) {
    log.error(`Failed to move ${track.path} to ${archivePath}`, error);
    return undefined;
  }
}

async function processTrack(
  track: TrackFile,
  options: ProcessOptions,
  claimedOutputs: Set<string>
): Promise<ConversionResult> {
  const { log, dryRun } = options;
  const outputPath = getOutputPath(track.path);
  const outputExisted = fs.existsSync(outputPath);
  const base = { track, outputPath, originalSize: track.size };

  // song.flac and song.m4a share song.mp3; the first converted one keeps it
  if (claimedOutputs.has(outputPath)) {
    log.info(`Skipping ${track.path}: ${outputPath} is written by another track in this run`);
    return { ...base, status: 'skipped' };
  }

  if (outputExisted && !options.overwrite) {
    log.info(`Skipping ${track.path}: ${outputPath} already exists`);
    return { ...base, status: 'skipped' };
  }

  const archivePath = options.keepOriginals
    ? undefined
    : getArchivePath(track.path, track.format, options.libraryRoot, options.archiveRoot);

  if (dryRun) {
    log.dryRun(`Would convert ${track.path} to ${outputPath}`);
    if (archivePath) log.dryRun(`Would move ${track.path} to ${archivePath}`);
    const resultSize = await projectOutputSize(track, options);
    claimedOutputs.add(outputPath);
    return { ...base, status: 'planned', resultSize, archivedTo: archivePath };
  }

  let resultSize: number;
  try {
    await options.transcoder.transcode(track.path, outputPath);
    resultSize = getFileSize(outputPath);
  } catch (error) {
    const failure = error instanceof ConversionFailedError ? error : new ConversionFailedError(track.path, error);
    log.error(`Failed to convert ${track.path}: ${failure.message}`);
    if (!outputExisted && fs.existsSync(outputPath)) {
      deleteFile(outputPath);
      log.debug(`Removed partial output ${outputPath}`);
    }
    return { ...base, status: 'failed', error: failure.message };
  }

  claimedOutputs.add(outputPath);
  log.success(`Converted ${track.path} to ${outputPath} (${readableFileSize(track.size)} -> ${readableFileSize(resultSize)})`);
  const archivedTo = archivePath ? archiveOriginal(track, archivePath, log) : undefined;
  return { ...base, status: 'converted', resultSize, archivedTo };
}

/**
 * Converts the given tracks one after another, in order. A failed file is
 * recorded and the run moves on; after an interrupt the current file
 * finishes and the rest are left untouched. In dry run mode nothing on disk
 * changes and sizes are projected from the transcoder's estimate.
 */
export async function processTracks(tracks: TrackFile[], options: ProcessOptions): Promise<ConversionResult[]> {
  const results: ConversionResult[] = [];
  const claimedOutputs = new Set<string>();

  for (const [i, track] of tracks.entries()) {
    if (options.runState?.interrupted) {
      options.log.console.warning(`Interrupted: ${tracks.length - i} tracks were not processed.`);
      break;
    }

    options.progressBar?.update(i, { task: path.relative(options.libraryRoot, track.path) });
    results.push(await processTrack(track, options, claimedOutputs));
    options.progressBar?.update(i + 1);
  }

  return results;
}

/**
 * Prints the size totals of a run and records them, in bytes, in the log.
 */
export function reportSummary(summary: ConversionSummary, dryRun: boolean, log: Log): void {
  const prefix = dryRun ? 'Projected ' : '';

  if (dryRun) {
    log.console.result(`${summary.planned} files would be converted, ${summary.skipped} skipped.`);
  } else {
    log.console.result(`${summary.converted} converted, ${summary.failed} failed, ${summary.skipped} skipped.`);
  }

  log.console.info(`Total original size: ${readableFileSize(summary.originalBytes)}`);
  log.console.info(`${prefix}Total converted size: ${readableFileSize(summary.resultBytes)}`);
  log.console.info(`${prefix}Space saved: ${readableFileSize(summary.savedBytes)}`);

  log.info(`Total original size: ${summary.originalBytes} bytes`);
  log.info(`${prefix}Total converted size: ${summary.resultBytes} bytes`);
  log.info(`${prefix}Space saved: ${summary.savedBytes} bytes`);
}

function loadOrScan(directory: string, options: ConvertOptions): LibraryScan {
  const root = path.resolve(directory);

  if (options.indexFile) {
    assertReadableDirectory(root);
    const scan = loadIndex(options.indexFile, options.log, options.artistDepth);
    if (path.resolve(scan.root) !== root) {
      throw new Error(`Index file ${options.indexFile} was built for ${scan.root}, not ${root}`);
    }
    return scan;
  }

  const archiveRoot = path.resolve(options.archiveDir ?? root);
  const spinner = options.spinner;
  spinner?.start('Indexing music files...');
  try {
    const scan = scanLibrary(root, {
      log: options.log,
      artistDepth: options.artistDepth,
      excludeDirs: getArchiveDirectories(archiveRoot),
      runState: options.runState,
      spinner,
    });
    spinner?.succeed(`Indexed ${scan.tracks.length} tracks by ${scan.index.size} artists`);
    return scan;
  } catch (error) {
    spinner?.fail('Indexing failed');
    throw error;
  }
}

/**
 * One conversion run over a music library: index it (or load a saved
 * index), select tracks by artist, convert them and report the size savings.
 *
 * @param directory - Library root.
 * @throws PathNotFoundError before anything is converted if the root is missing.
 */
export async function convertLibrary(directory: string, options: ConvertOptions): Promise<ConversionRun> {
  const { log, dryRun } = options;
  log.console.header('Convert lossless audio to MP3');
  if (dryRun) {
    log.console.warning('Running in DRY RUN mode. No files will be modified.');
  }

  const scan = loadOrScan(directory, options);
  const archiveRoot = path.resolve(options.archiveDir ?? scan.root);

  let artists = options.artists;
  if (options.interactive) {
    const prompt = options.promptArtists ?? promptForArtists;
    artists = await prompt([...scan.index.keys()]);
    if (artists.length === 0) {
      log.console.info('No artists selected for conversion.');
      return { selection: [], missingArtists: [], results: [], summary: summarizeResults([]) };
    }
  }

  const { tracks, missingArtists } = selectTracks(scan.index, artists, log);
  for (const missing of missingArtists) {
    log.console.warning(`Artist ${missing}: 0 tracks found`);
  }
  for (const track of tracks) {
    log.info(`Selected ${track.path}`);
  }
  log.console.info(`Selected ${tracks.length} tracks for conversion.`);

  const progressBar = options.showProgress && tracks.length > 0
    ? new ProgressBar(tracks.length)
    : undefined;

  let results: ConversionResult[];
  try {
    results = await processTracks(tracks, {
      log,
      transcoder: options.transcoder,
      dryRun,
      libraryRoot: scan.root,
      archiveRoot,
      keepOriginals: options.keepOriginals,
      overwrite: options.overwrite,
      runState: options.runState,
      progressBar,
    });
  } finally {
    progressBar?.stop();
  }

  const summary = summarizeResults(results);
  reportSummary(summary, dryRun, log);

  if (!dryRun && options.outputDir) {
    writeScriptResults(options.outputDir, 'convertLibrary', { ...summary }, log);
  }

  return { selection: tracks, missingArtists, results, summary };
}
