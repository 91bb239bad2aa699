import { Command } from 'commander';
import { convertLibrary } from '../scripts/convertLibrary';
import { getConfig, getMusicDirectory, parsePositiveInteger } from '../utils/config';
import { Spinner } from '../utils/progress';
import { FfmpegTranscoder } from '../utils/transcoder';
import { runCommand } from './runCommand';

interface ConvertCommandOptions {
  artist?: string[];
  dryRun?: boolean;
  logFile?: string;
  interactive?: boolean;
  depth?: string;
  bitrate?: string;
  keepOriginals?: boolean;
  archiveDir?: string;
  overwrite?: boolean;
  indexFile?: string;
}

const program = new Command();

program
  .name('convert')
  .description('Convert FLAC and M4A files to MP3, artist by artist')
  .argument('[directory]', 'music library root (defaults to MUSIC_LIBRARY_PATH environment variable)')
  .option('-a, --artist <names...>', 'only convert these artists (case-insensitive, "all" for every artist)')
  .option('-d, --dry-run', 'show what would be converted without writing, moving or deleting anything')
  .option('-l, --log-file <path>', 'write the log to this file instead of the daily rotated logs')
  .option('-i, --interactive', 'choose artists from a numbered list')
  .option('--depth <n>', 'folder level below the root that names the artist')
  .option('-b, --bitrate <kbps>', 'MP3 bitrate in kbps')
  .option('--keep-originals', 'leave source files in place after converting')
  .option('--archive-dir <path>', 'where converted originals are moved (defaults to the library root)')
  .option('--overwrite', 'replace MP3 files that already exist')
  .option('--index-file <path>', 'use an index saved by the index command instead of scanning')
  /**
   * Resolves the library root and settings, then runs one conversion.
   * A missing root ends the command with exit code 1 before any conversion.
   */
  .action(async (directory: string | undefined, options: ConvertCommandOptions) => {
    const config = getConfig();

    await runCommand(config, options.logFile, async (log, runState) => {
      const musicDir = getMusicDirectory(directory, config);
      const bitrate = options.bitrate ? parsePositiveInteger(options.bitrate, '--bitrate') : config.bitrate;
      log.info(`Using directory: ${musicDir}`);

      await convertLibrary(musicDir, {
        log,
        runState,
        transcoder: new FfmpegTranscoder({
          bitrate,
          ffmpegPath: config.ffmpegPath,
          ffprobePath: config.ffprobePath,
        }),
        dryRun: options.dryRun ?? config.dryRun,
        artists: options.artist,
        interactive: options.interactive,
        artistDepth: options.depth ? parsePositiveInteger(options.depth, '--depth') : config.artistDepth,
        archiveDir: options.archiveDir,
        keepOriginals: options.keepOriginals,
        overwrite: options.overwrite,
        indexFile: options.indexFile,
        outputDir: config.outputDir,
        spinner: new Spinner('Preparing'),
        showProgress: true,
      });
    });
  });

export default program;
