import * as fs from 'fs';
import * as path from 'path';
import { getTrackFormat, type TrackFormat } from './audio';
import { describeError, type UnreadableEntry } from './errors';
import { isInsideDirectory } from './file';
import {
  buildArtistIndex,
  compareTracks,
  DEFAULT_ARTIST_DEPTH,
  inferArtistName,
  type LibraryScan,
  type TrackFile
} from './library';
import type { Log } from './logger';

const INDEX_VERSION = 1;

interface StoredTrack {
  path: string;
  format: TrackFormat;
  size: number;
  artist: string;
}

interface IndexFileData {
  version: typeof INDEX_VERSION;
  root: string;
  createdAt: string;
  tracks: StoredTrack[];
}

function isStoredTrack(value: unknown): value is StoredTrack {
  return typeof value === 'object' && value !== null
    && 'path' in value && typeof value.path === 'string'
    && 'format' in value && (value.format === 'flac' || value.format === 'm4a')
    && 'size' in value && typeof value.size === 'number'
    && 'artist' in value && typeof value.artist === 'string';
}

function isIndexFileData(value: unknown): value is IndexFileData {
  return typeof value === 'object' && value !== null
    && 'version' in value && value.version === INDEX_VERSION
    && 'root' in value && typeof value.root === 'string'
    && 'createdAt' in value && typeof value.createdAt === 'string'
    && 'tracks' in value && Array.isArray(value.tracks) && value.tracks.every(isStoredTrack);
}

/**
 * Saves a scan so later runs can skip walking the library.
 */
export function saveIndex(filePath: string, scan: LibraryScan, log: Log): void {
  const data: IndexFileData = {
    version: INDEX_VERSION,
    root: scan.root,
    createdAt: new Date().toISOString(),
    tracks: scan.tracks.map(({ path: trackPath, format, size, artist }) => ({ path: trackPath, format, size, artist })),
  };

  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
  log.info(`Saved index of ${data.tracks.length} tracks to ${filePath}`);
}

/**
 * Loads a saved index. Tracks that no longer exist, moved outside the root
 * or lost their convertible extension are dropped with a warning, and sizes
 * are refreshed from disk. Artists are named again at `artistDepth`, so the
 * depth of the current run applies whatever depth the index was saved with.
 *
 * @throws Error if the file cannot be read or does not contain an index.
 */
export function loadIndex(filePath: string, log: Log, artistDepth: number = DEFAULT_ARTIST_DEPTH): LibraryScan {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  if (!isIndexFileData(parsed)) {
    throw new Error(`Invalid index file: ${filePath}`);
  }

  const tracks: TrackFile[] = [];
  const skipped: UnreadableEntry[] = [];

  for (const stored of parsed.tracks) {
    if (!isInsideDirectory(parsed.root, stored.path) || getTrackFormat(stored.path) !== stored.format) {
      log.warning(`Ignoring index entry outside the library or with wrong format: ${stored.path}`);
      skipped.push({ path: stored.path, reason: 'invalid index entry' });
      continue;
    }

    let size: number;
    try {
      const stat = fs.statSync(stored.path);
      if (!stat.isFile()) throw new Error('not a regular file');
      size = stat.size;
    } catch (error) {
      log.warning(`Indexed file is no longer available, skipping ${stored.path}: ${describeError(error)}`);
      skipped.push({ path: stored.path, reason: describeError(error) });
      continue;
    }

    const artist = inferArtistName(parsed.root, stored.path, artistDepth);
    if (artist !== stored.artist) {
      log.debug(`Artist of ${stored.path} is ${artist} at depth ${artistDepth} (indexed as ${stored.artist})`);
    }
    tracks.push({ path: stored.path, format: stored.format, size, artist });
  }

  tracks.sort(compareTracks);
  log.info(`Loaded index from ${filePath} (created ${parsed.createdAt}): ${tracks.length} tracks`);

  return { root: parsed.root, tracks, index: buildArtistIndex(tracks), skipped };
}
