import * as path from 'path';

export type TrackFormat = 'flac' | 'm4a';

export const CONVERTIBLE_EXTENSIONS = ['.flac', '.m4a'] as const;
export const OUTPUT_EXTENSION = '.mp3';

type ConvertibleExtension = (typeof CONVERTIBLE_EXTENSIONS)[number];

const TRACK_FORMATS: Record<ConvertibleExtension, TrackFormat> = {
  '.flac': 'flac',
  '.m4a': 'm4a',
};

/**
 * Returns the track format for a convertible file name, comparing the
 * extension case-insensitively, or undefined for anything else.
 */
export function getTrackFormat(fileName: string): TrackFormat | undefined {
  const extension = path.extname(fileName).toLowerCase();
  const match = CONVERTIBLE_EXTENSIONS.find(candidate => candidate === extension);
  return match === undefined ? undefined : TRACK_FORMATS[match];
}

export function isConvertibleFile(fileName: string): boolean {
  return getTrackFormat(fileName) !== undefined;
}

/**
 * The MP3 written next to its source: same directory and base name.
 */
export function getOutputPath(filePath: string): string {
  const { dir, name } = path.parse(filePath);
  return path.join(dir, `${name}${OUTPUT_EXTENSION}`);
}

// FLAC_CONVERTED, M4A_CONVERTED
export function getArchiveFolderName(format: TrackFormat): string {
  return `${format.toUpperCase()}_CONVERTED`;
}

/**
 * Folders that receive converted originals. They live inside the library by
 * default, so scans must not descend into them.
 */
export function getArchiveDirectories(archiveRoot: string): string[] {
  return CONVERTIBLE_EXTENSIONS.map(extension => path.join(archiveRoot, getArchiveFolderName(TRACK_FORMATS[extension])));
}

/**
 * Where an original goes once converted, keeping its path relative to the
 * library root: `<archiveRoot>/FLAC_CONVERTED/Artist/Album/track.flac`.
 */
export function getArchivePath(filePath: string, format: TrackFormat, libraryRoot: string, archiveRoot: string): string {
  return path.join(archiveRoot, getArchiveFolderName(format), path.relative(libraryRoot, filePath));
}
