import * as cliProgress from 'cli-progress';
import ora from 'ora';

interface Indicator {
  stop(): void;
}

// Running indicators, so an interrupt can clear the terminal before exiting
const activeIndicators = new Set<Indicator>();

/**
 * Stops every spinner and progress bar that is still running.
 */
export function stopAllProgress(): void {
  for (const indicator of [...activeIndicators]) {
    indicator.stop();
  }
}

/**
 * Ora spinner shown while the library is indexed. One instance is reused
 * across the steps of a run.
 */
export class Spinner implements Indicator {
  private spinner: ReturnType<typeof ora>;

  constructor(text: string) {
    this.spinner = ora(text);
  }

  start(text?: string): void {
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    activeIndicators.add(this);
  }

  update(text: string): void {
    this.spinner.text = text;
  }

  succeed(text?: string): void {
    this.spinner.succeed(text);
    activeIndicators.delete(this);
  }

  fail(text?: string): void {
    this.spinner.fail(text);
    activeIndicators.delete(this);
  }

  stop(): void {
    this.spinner.stop();
    activeIndicators.delete(this);
  }
}

/**
 * cli-progress bar for the conversion loop, one tick per track.
 */
export class ProgressBar implements Indicator {
  private bar: cliProgress.SingleBar;

  /**
   * @param format - cli-progress format string; `{task}` shows the current track.
   */
  constructor(total: number, format = 'Converting: [{bar}] {percentage}% | {value}/{total} | {task}') {
    this.bar = new cliProgress.SingleBar({
      format,
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true
    });
    this.bar.start(total, 0, { task: 'Starting' });
    activeIndicators.add(this);
  }

  update(value: number, payload?: { task?: string }): void {
    this.bar.update(value, payload);
  }

  stop(): void {
    this.bar.stop();
    activeIndicators.delete(this);
  }
}
