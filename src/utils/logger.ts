import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export const DEFAULT_LOG_DIR = path.join(process.cwd(), 'output', 'logs');

export interface LogMethods {
  debug: (message: string) => void;
  info: (message: string) => void;
  success: (message: string) => void;
  warning: (message: string) => void;
  error: (message: string, err?: unknown) => void;
  header: (message: string) => void;
  subHeader: (message: string) => void;
  dryRun: (message: string) => void;
  result: (message: string) => void;
}

/**
 * Logging context handed to every script. Plain methods only write to the log
 * files; `console` methods also print a coloured line to the terminal.
 */
export interface Log extends LogMethods {
  console: LogMethods;
  /** Flushes and releases the file transports. */
  close: () => Promise<void>;
}

export interface LoggerOptions {
  /** Single log file. When omitted, daily rotated files are written to `logDir`. */
  logFile?: string;
  /** Receives error entries only. Defaults to a `-errors` sibling of the main log. */
  errorLogFile?: string;
  logDir?: string;
  level?: string;
  silent?: boolean;
}

function ensureDirectory(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Derives the error log path from the main log path:
 * `logs/conversion.log` becomes `logs/conversion-errors.log`.
 */
export function getErrorLogPath(logFile: string): string {
  const { dir, name, ext } = path.parse(logFile);
  return path.join(dir, `${name}-errors${ext || '.log'}`);
}

function errorDetail(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? err.message;
  }
  return typeof err === 'string' ? err : JSON.stringify(err);
}

/**
 * Creates the logging context for one run. Call `close()` on the returned
 * object before the process exits.
 */
export function createLogger(options: LoggerOptions = {}): Log {
  const logDir = options.logDir ?? DEFAULT_LOG_DIR;
  const mainLogFile = options.logFile ? path.resolve(options.logFile) : undefined;
  const errorLogFile = options.errorLogFile
    ?? (mainLogFile ? getErrorLogPath(mainLogFile) : path.join(logDir, 'errors.log'));

  ensureDirectory(mainLogFile ? path.dirname(mainLogFile) : logDir);
  ensureDirectory(path.dirname(errorLogFile));

  const mainTransport = mainLogFile
    ? new winston.transports.File({ filename: mainLogFile })
    : new DailyRotateFile({
      filename: path.join(logDir, 'conversion-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxSize: '5m',
      maxFiles: '14d',
      zippedArchive: true
    });

  const logger = winston.createLogger({
    level: options.level ?? 'debug',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ level, message, timestamp }) => {
        return `${timestamp} ${level.toUpperCase()}: ${message}`;
      })
    ),
    transports: [
      mainTransport,
      new winston.transports.File({ filename: errorLogFile, level: 'error' })
    ],
    silent: options.silent ?? process.env.NODE_ENV === 'test',
  });

  const baseLog: LogMethods = {
    debug: (message) => {
      logger.debug(message);
    },
    info: (message) => {
      logger.info(message);
    },
    success: (message) => {
      logger.info(`SUCCESS: ${message}`);
    },
    warning: (message) => {
      logger.warn(message);
    },
    error: (message, err) => {
      logger.error(message);
      if (err !== undefined) logger.error(errorDetail(err));
    },
    header: (message) => {
      logger.info(`=== ${message} ===`);
    },
    subHeader: (message) => {
      logger.info(message);
    },
    dryRun: (message) => {
      logger.info(`[DRY RUN] ${message}`);
    },
    result: (message) => {
      logger.info(`RESULT: ${message}`);
    }
  };

  function consoleLog(key: keyof LogMethods, message: string, formattedMessage: string) {
    console.log(formattedMessage);
    baseLog[key](message);
  }

  const outputConsole: LogMethods = {
    debug: (message) => consoleLog('debug', message, chalk.gray(`DEBUG: ${message}`)),
    info: (message) => consoleLog('info', message, chalk.blue(`INFO: ${message}`)),
    success: (message) => consoleLog('success', message, chalk.green(`✓ ${message}`)),
    warning: (message) => consoleLog('warning', message, chalk.yellow(`WARNING: ${message}`)),
    error: (message, err) => {
      console.error(chalk.red(`ERROR: ${message}`));
      baseLog.error(message, err);
    },
    header: (message) => consoleLog('header', message, chalk.bold.blue(`\n=== ${message} ===`)),
    subHeader: (message) => consoleLog('subHeader', message, chalk.bold.cyan(`\n${message}`)),
    dryRun: (message) => consoleLog('dryRun', message, chalk.magenta(`[DRY RUN] ${message}`)),
    result: (message) => consoleLog('result', message, chalk.green(`✓ ${message}`)),
  };

  return {
    ...baseLog,
    console: outputConsole,
    close: () => new Promise<void>((resolve) => {
      logger.on('finish', () => resolve());
      logger.end();
    }),
  };
}
