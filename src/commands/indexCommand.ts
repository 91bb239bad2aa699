import { Command } from 'commander';
import { indexLibrary } from '../scripts/indexLibrary';
import { getConfig, getMusicDirectory, parsePositiveInteger } from '../utils/config';
import { Spinner } from '../utils/progress';
import { runCommand } from './runCommand';

const program = new Command();

program
  .name('index')
  .description('List the artists and convertible files in a music library')
  .argument('[directory]', 'music library root (defaults to MUSIC_LIBRARY_PATH environment variable)')
  .option('-o, --output <path>', 'save the index for convert --index-file')
  .option('-l, --log-file <path>', 'write the log to this file instead of the daily rotated logs')
  .option('--depth <n>', 'folder level below the root that names the artist')
  .option('--archive-dir <path>', 'archive folder to leave out of the scan (defaults to the library root)')
  .action(async (directory: string | undefined, options: {
    output?: string,
    logFile?: string,
    depth?: string,
    archiveDir?: string
  }) => {
    const config = getConfig();

    await runCommand(config, options.logFile, async (log, runState) => {
      indexLibrary(getMusicDirectory(directory, config), {
        log,
        runState,
        artistDepth: options.depth ? parsePositiveInteger(options.depth, '--depth') : config.artistDepth,
        archiveDir: options.archiveDir,
        output: options.output,
        spinner: new Spinner('Preparing'),
      });
    });
  });

export default program;
