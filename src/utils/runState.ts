import { InterruptedError } from './errors';
import type { Log } from './logger';
import { stopAllProgress } from './progress';

/**
 * Tracks whether the current run may continue. Created once per command and
 * passed to the scripts; Ctrl+C flips it through `handleInterrupts`.
 */
export class RunState {
  private inProgress = true;

  get interrupted(): boolean {
    return !this.inProgress;
  }

  interrupt(): void {
    this.inProgress = false;
  }

  /**
   * Throws an InterruptedError once the run has been interrupted.
   * Used inside loops that cannot stop half way, such as the directory scan.
   */
  validate(): void {
    if (!this.inProgress) {
      throw new InterruptedError();
    }
  }
}

/**
 * First Ctrl+C lets the file being converted finish and stops the run
 * afterwards; a second one exits immediately with the conventional code 130.
 */
export function handleInterrupts(runState: RunState, log: Log): void {
  process.once('SIGINT', () => {
    log.console.warning('Interrupted by user. Finishing the current file, press Ctrl+C again to exit now.');
    runState.interrupt();

    process.once('SIGINT', () => {
      stopAllProgress();
      log.warning('Second interrupt received. Exiting.');
      process.exit(130);
    });
  });
}
