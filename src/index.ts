#!/usr/bin/env node
import { Command } from 'commander';
import { convertCommand, indexCommand } from './commands';

const program = new Command();

program
  .name('lossless-to-mp3')
  .description('Convert FLAC and M4A files in a music library to MP3')
  .version('1.0.0');

// Add all subcommands
program.addCommand(convertCommand);
program.addCommand(indexCommand);

// Parse command line arguments
program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
