import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { getConfig, getMusicDirectory, parsePositiveInteger } from './config';

describe('config', () => {
  it('falls back to defaults', () => {
    expect(getConfig({})).toEqual({
      libraryPath: undefined,
      dryRun: false,
      artistDepth: 1,
      bitrate: 320,
      ffmpegPath: undefined,
      ffprobePath: undefined,
      logFile: undefined,
      errorLogFile: undefined,
      outputDir: path.resolve('output'),
    });
  });

  it('reads settings from the environment', () => {
    const config = getConfig({
      MUSIC_LIBRARY_PATH: ' /Volumes/Media/Music ',
      DRY_RUN: 'true',
      ARTIST_DEPTH: '2',
      MP3_BITRATE: '192',
      FFMPEG_PATH: '/opt/ffmpeg/bin/ffmpeg',
      OUTPUT_DIR: '/tmp/conversion-output',
    });

    expect(config.libraryPath).toBe('/Volumes/Media/Music');
    expect(config.dryRun).toBe(true);
    expect(config.artistDepth).toBe(2);
    expect(config.bitrate).toBe(192);
    expect(config.ffmpegPath).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(config.outputDir).toBe('/tmp/conversion-output');
  });

  it('names the setting that is not a positive integer', () => {
    expect(() => getConfig({ ARTIST_DEPTH: '0' })).toThrow('ARTIST_DEPTH must be a positive integer, got "0"');
    expect(() => parsePositiveInteger('1.5', '--depth')).toThrow('--depth must be a positive integer, got "1.5"');
    expect(parsePositiveInteger(' 256 ', '--bitrate')).toBe(256);
  });

  it('prefers the directory argument over the environment', () => {
    const config = getConfig({ MUSIC_LIBRARY_PATH: '/music' });

    expect(getMusicDirectory('/elsewhere', config)).toBe('/elsewhere');
    expect(getMusicDirectory(undefined, config)).toBe('/music');
    expect(() => getMusicDirectory(undefined, getConfig({}))).toThrow(/No music directory specified/);
  });
});
