import chalk from 'chalk';
import { createInterface } from 'readline/promises';
import { parseArtistChoice } from './library';

/**
 * Shows a numbered artist menu on the terminal and returns the picked names.
 */
export async function promptForArtists(artists: string[]): Promise<string[]> {
  console.log(chalk.bold.cyan('\nSelect artists to convert (comma separated):'));
  console.log('0. None');
  console.log('all. All artists');
  artists.forEach((artist, i) => {
    console.log(`${i + 1}. ${artist}`);
  });

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question("Enter numbers or 'all': ");
    return parseArtistChoice(answer, artists, true);
  } finally {
    rl.close();
  }
}
