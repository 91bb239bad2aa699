/**
 * Raised when the library root is missing, is not a directory or cannot be
 * read. Nothing has been scanned or converted when this is thrown.
 */
export class PathNotFoundError extends Error {
  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Directory does not exist or is not readable: ${path}`, options);
    this.name = 'PathNotFoundError';
  }
}

/** The transcoder exited with an error for one source file. */
export class ConversionFailedError extends Error {
  constructor(readonly sourcePath: string, cause?: unknown) {
    super(`Error converting ${sourcePath}: ${describeError(cause)}`, { cause });
    this.name = 'ConversionFailedError';
  }
}

export const USER_INTERRUPTION_MESSAGE = 'Conversion halted by user.';

export class InterruptedError extends Error {
  constructor() {
    super(USER_INTERRUPTION_MESSAGE);
    this.name = 'InterruptedError';
  }
}

/** A file or directory the scan could not stat or read. */
export interface UnreadableEntry {
  path: string;
  reason: string;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}
