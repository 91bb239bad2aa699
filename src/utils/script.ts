import * as fs from 'fs';
import * as path from 'path';
import type { Log } from './logger';

/**
 * Writes the counters of a finished run to `<outputDir>/<scriptName>.json`.
 *
 * @param scriptName - Name of the script that ran, e.g. 'convertLibrary'.
 * @param resultsData - Counters to record.
 * @returns The path of the written file.
 */
export function writeScriptResults(
  outputDir: string,
  scriptName: string,
  resultsData: Record<string, number>,
  log: Log
): string {
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  const outputFilePath = path.join(outputDir, `${path.basename(scriptName, '.ts')}.json`);
  fs.writeFileSync(outputFilePath, JSON.stringify(resultsData, null, 2));
  log.info(`Results saved to ${outputFilePath}`);
  return outputFilePath;
}
