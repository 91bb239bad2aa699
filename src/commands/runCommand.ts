import * as path from 'path';
import type { AppConfig } from '../utils/config';
import { describeError, InterruptedError } from '../utils/errors';
import { createLogger, type Log } from '../utils/logger';
import { stopAllProgress } from '../utils/progress';
import { handleInterrupts, RunState } from '../utils/runState';

/**
 * Sets up the logging context and interrupt handling for one command,
 * runs it, reports a fatal error and sets the exit code, then closes the log.
 */
export async function runCommand(
  config: AppConfig,
  logFile: string | undefined,
  task: (log: Log, runState: RunState) => Promise<void>
): Promise<void> {
  const log = createLogger({
    logFile: logFile ?? config.logFile,
    errorLogFile: config.errorLogFile,
    logDir: path.join(config.outputDir, 'logs'),
  });
  const runState = new RunState();
  handleInterrupts(runState, log);

  try {
    await task(log, runState);
  } catch (error) {
    if (error instanceof InterruptedError) {
      log.console.warning(error.message);
      process.exitCode = 130;
    } else {
      log.console.error(describeError(error), error);
      process.exitCode = 1;
    }
  } finally {
    stopAllProgress();
    await log.close();
  }
}
