import * as dotenv from 'dotenv';
import * as path from 'path';
import { DEFAULT_ARTIST_DEPTH } from './library';
import { DEFAULT_BITRATE } from './transcoder';

// Load environment variables from .env file
dotenv.config();

export interface AppConfig {
  libraryPath?: string;
  dryRun: boolean;
  artistDepth: number;
  bitrate: number;
  ffmpegPath?: string;
  ffprobePath?: string;
  logFile?: string;
  errorLogFile?: string;
  /** Results JSON and rotated logs are written below this directory. */
  outputDir: string;
}

/**
 * Parses a whole number greater than zero, naming the offending setting
 * when the value is not one.
 */
export function parsePositiveInteger(value: string, name: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function optionalString(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

/**
 * Determines the music library root. A directory given on the command line
 * wins over the MUSIC_LIBRARY_PATH environment variable.
 *
 * @throws Error if neither is set.
 */
export function getMusicDirectory(specifiedDir?: string, config: AppConfig = getConfig()): string {
  if (specifiedDir) {
    return specifiedDir;
  }

  if (!config.libraryPath) {
    throw new Error(
      'No music directory specified. Either provide a directory path or set the MUSIC_LIBRARY_PATH environment variable in a .env file.'
    );
  }

  return config.libraryPath;
}

/**
 * Reads the application settings from the environment:
 *  - `MUSIC_LIBRARY_PATH`: library root used when no directory argument is given
 *  - `DRY_RUN`: `true` enables dry run mode by default
 *  - `ARTIST_DEPTH`: folder level below the root that names the artist (default 1)
 *  - `MP3_BITRATE`: MP3 bitrate in kbps (default 320)
 *  - `FFMPEG_PATH` / `FFPROBE_PATH`: binaries to use instead of the ones on PATH
 *  - `LOG_FILE` / `ERROR_LOG_FILE`: fixed log files instead of daily rotated ones
 *  - `OUTPUT_DIR`: where results and logs go (default `./output`)
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    libraryPath: optionalString(env.MUSIC_LIBRARY_PATH),
    dryRun: env.DRY_RUN === 'true',
    artistDepth: env.ARTIST_DEPTH ? parsePositiveInteger(env.ARTIST_DEPTH, 'ARTIST_DEPTH') : DEFAULT_ARTIST_DEPTH,
    bitrate: env.MP3_BITRATE ? parsePositiveInteger(env.MP3_BITRATE, 'MP3_BITRATE') : DEFAULT_BITRATE,
    ffmpegPath: optionalString(env.FFMPEG_PATH),
    ffprobePath: optionalString(env.FFPROBE_PATH),
    logFile: optionalString(env.LOG_FILE),
    errorLogFile: optionalString(env.ERROR_LOG_FILE),
    outputDir: path.resolve(optionalString(env.OUTPUT_DIR) ?? 'output'),
  };
}
