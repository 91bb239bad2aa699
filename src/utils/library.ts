import * as fs from 'fs';
import * as path from 'path';
import { getTrackFormat, isConvertibleFile, type TrackFormat } from './audio';
import { PathNotFoundError, type UnreadableEntry } from './errors';
import { compareStrings, traverseDirectory } from './file';
import type { Log } from './logger';
import type { Spinner } from './progress';
import type { RunState } from './runState';

export const DEFAULT_ARTIST_DEPTH = 1;

export interface TrackFile {
  readonly path: string;
  readonly format: TrackFormat;
  readonly size: number;
  readonly artist: string;
}

/** Artist name to its tracks, both in lexicographic order. */
export type ArtistIndex = Map<string, TrackFile[]>;

export interface LibraryScan {
  root: string;
  /** Every discovered track, sorted by path. */
  tracks: TrackFile[];
  index: ArtistIndex;
  skipped: UnreadableEntry[];
}

export interface ScanOptions {
  log: Log;
  artistDepth?: number;
  excludeDirs?: string[];
  spinner?: Spinner;
  runState?: RunState;
}

export interface Selection {
  tracks: TrackFile[];
  /** Requested artists that have no tracks in the index. */
  missingArtists: string[];
}

export function compareTracks(a: TrackFile, b: TrackFile): number {
  return compareStrings(a.path, b.path);
}

/**
 * Names the artist a file belongs to from its location below the library root.
 *
 * `depth` counts folders below the root, 1 being the first one:
 * with depth 1 `Artist/Album/01.flac` belongs to `Artist`, with depth 2 to
 * `Album`. A file shallower than `depth` belongs to its parent folder, and a
 * file directly in the root to the root folder itself.
 */
export function inferArtistName(root: string, filePath: string, depth: number = DEFAULT_ARTIST_DEPTH): string {
  if (!Number.isInteger(depth) || depth < 1) {
    throw new RangeError(`Artist depth must be a positive integer, got ${depth}`);
  }

  const relativeDir = path.dirname(path.relative(root, filePath));
  const segments = relativeDir === '.' ? [] : relativeDir.split(path.sep).filter(Boolean);

  if (segments.length >= depth) {
    return segments[depth - 1];
  }
  if (segments.length > 0) {
    return segments[segments.length - 1];
  }
  return path.basename(path.resolve(root));
}

/**
 * Throws PathNotFoundError unless `root` is a directory this process can list.
 */
export function assertReadableDirectory(root: string): void {
  try {
    if (!fs.statSync(root).isDirectory()) {
      throw new PathNotFoundError(root);
    }
    fs.accessSync(root, fs.constants.R_OK | fs.constants.X_OK);
  } catch (error) {
    if (error instanceof PathNotFoundError) throw error;
    throw new PathNotFoundError(root, { cause: error });
  }
}

export function buildArtistIndex(tracks: TrackFile[]): ArtistIndex {
  const grouped = new Map<string, TrackFile[]>();
  for (const track of tracks) {
    const artistTracks = grouped.get(track.artist);
    if (artistTracks) {
      artistTracks.push(track);
    } else {
      grouped.set(track.artist, [track]);
    }
  }

  const index: ArtistIndex = new Map();
  for (const artist of [...grouped.keys()].sort(compareStrings)) {
    index.set(artist, (grouped.get(artist) ?? []).sort(compareTracks));
  }
  return index;
}

/**
 * Walks the library and indexes every `.flac` and `.m4a` file by artist.
 * Read-only. Throws PathNotFoundError before touching anything when the
 * root is missing or unreadable; unreadable entries below it are logged
 * and skipped.
 */
export function scanLibrary(root: string, options: ScanOptions): LibraryScan {
  const libraryRoot = path.resolve(root);
  assertReadableDirectory(libraryRoot);

  const { log } = options;
  const depth = options.artistDepth ?? DEFAULT_ARTIST_DEPTH;
  const tracks: TrackFile[] = [];
  const skipped: UnreadableEntry[] = [];

  log.info(`Indexing music files in ${libraryRoot}`);

  traverseDirectory(
    libraryRoot,
    (filePath, stat) => {
      const format = getTrackFormat(filePath);
      if (!format) return;
      tracks.push({
        path: filePath,
        format,
        size: stat.size,
        artist: inferArtistName(libraryRoot, filePath, depth)
      });
    },
    {
      log,
      filter: isConvertibleFile,
      excludeDirs: options.excludeDirs,
      onUnreadable: entry => skipped.push(entry),
      runState: options.runState,
      spinner: options.spinner
    }
  );

  tracks.sort(compareTracks);
  const index = buildArtistIndex(tracks);

  for (const [artist, artistTracks] of index) {
    log.info(`Found artist: ${artist} (${artistTracks.length} tracks)`);
  }

  const flacCount = tracks.filter(track => track.format === 'flac').length;
  log.info(`Found ${flacCount} FLAC files and ${tracks.length - flacCount} M4A files.`);
  if (skipped.length > 0) {
    log.warning(`Skipped ${skipped.length} unreadable entries.`);
  }

  return { root: libraryRoot, tracks, index, skipped };
}

function wantsAllArtists(artists: string[] | undefined): boolean {
  return !artists || artists.length === 0 || artists.some(artist => artist.trim().toLowerCase() === 'all');
}

/**
 * Picks the tracks to convert. Without a filter, or with `all`, every indexed
 * track is selected; otherwise artist names are matched exactly but
 * case-insensitively. Requested artists without tracks are reported, not
 * treated as errors. The result keeps lexicographic path order.
 */
export function selectTracks(index: ArtistIndex, artists?: string[], log?: Log): Selection {
  if (wantsAllArtists(artists)) {
    const tracks = [...index.values()].flat().sort(compareTracks);
    log?.info(`Selected all ${index.size} artists (${tracks.length} tracks)`);
    return { tracks, missingArtists: [] };
  }

  const requested = new Map<string, string>();
  for (const artist of artists ?? []) {
    const name = artist.trim();
    if (name) requested.set(name.toLowerCase(), name);
  }

  const selected: TrackFile[] = [];
  const matched = new Set<string>();

  for (const [artist, artistTracks] of index) {
    const key = artist.toLowerCase();
    if (requested.has(key)) {
      matched.add(key);
      selected.push(...artistTracks);
      log?.info(`Selected artist: ${artist} (${artistTracks.length} tracks)`);
    } else {
      for (const track of artistTracks) {
        log?.debug(`Skipping ${track.path} (artist ${artist} not selected)`);
      }
    }
  }

  const missingArtists: string[] = [];
  for (const [key, name] of requested) {
    if (!matched.has(key)) {
      missingArtists.push(name);
      log?.info(`Artist ${name}: 0 tracks found`);
    }
  }

  return { tracks: selected.sort(compareTracks), missingArtists };
}

/**
 * Reads the answer to the numbered artist menu: comma separated numbers
 * starting at 1, `0` for none, and `all` when allowed. Unknown entries are
 * ignored and each artist is returned once, in the order given.
 */
export function parseArtistChoice(input: string, artists: string[], allowAll: boolean): string[] {
  if (allowAll && input.trim().toLowerCase() === 'all') {
    return [...artists];
  }

  const chosen: string[] = [];
  for (const token of input.split(',')) {
    const value = token.trim();
    if (!/^\d+$/.test(value)) continue;

    const choice = Number(value);
    if (choice < 1 || choice > artists.length) continue;

    const artist = artists[choice - 1];
    if (!chosen.includes(artist)) {
      chosen.push(artist);
    }
  }
  return chosen;
}
