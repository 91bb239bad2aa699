import * as path from 'path';
import { getArchiveDirectories } from '../utils/audio';
import { readableFileSize } from '../utils/format';
import { saveIndex } from '../utils/indexCache';
import { scanLibrary, type ArtistIndex, type LibraryScan } from '../utils/library';
import type { Log } from '../utils/logger';
import type { Spinner } from '../utils/progress';
import type { RunState } from '../utils/runState';

export interface IndexOptions {
  log: Log;
  artistDepth?: number;
  archiveDir?: string;
  /** Saves the index here for later `convert --index-file` runs. */
  output?: string;
  runState?: RunState;
  spinner?: Spinner;
}

export interface ArtistStats {
  artist: string;
  flac: number;
  m4a: number;
  bytes: number;
}

export function getArtistStats(index: ArtistIndex): ArtistStats[] {
  return [...index].map(([artist, tracks]) => ({
    artist,
    flac: tracks.filter(track => track.format === 'flac').length,
    m4a: tracks.filter(track => track.format === 'm4a').length,
    bytes: tracks.reduce((total, track) => total + track.size, 0),
  }));
}

/**
 * Scans the library, prints one line per artist with its FLAC and M4A counts
 * and total size, and optionally saves the index.
 */
export function indexLibrary(directory: string, options: IndexOptions): LibraryScan {
  const { log } = options;
  const root = path.resolve(directory);
  log.console.header(`Index ${root}`);

  options.spinner?.start('Indexing music files...');
  let scan: LibraryScan;
  try {
    scan = scanLibrary(root, {
      log,
      artistDepth: options.artistDepth,
      excludeDirs: getArchiveDirectories(path.resolve(options.archiveDir ?? root)),
      runState: options.runState,
      spinner: options.spinner,
    });
  } catch (error) {
    options.spinner?.fail('Indexing failed');
    throw error;
  }
  options.spinner?.succeed(`Indexed ${scan.tracks.length} tracks by ${scan.index.size} artists`);

  const stats = getArtistStats(scan.index);
  const width = Math.max(0, ...stats.map(stat => stat.artist.length));
  for (const stat of stats) {
    log.console.info(`${stat.artist.padEnd(width)}  ${stat.flac} FLAC  ${stat.m4a} M4A  ${readableFileSize(stat.bytes)}`);
  }

  for (const entry of scan.skipped) {
    log.console.warning(`Unreadable: ${entry.path} (${entry.reason})`);
  }

  if (options.output) {
    saveIndex(options.output, scan, log);
  }

  return scan;
}
