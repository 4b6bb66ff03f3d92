import { ZodError } from 'zod';

export type ErrorCode = 'FILENAME_PATTERN' | 'MISSING_DATA' | 'IO_ERROR' | 'CONFIG_ERROR' | 'INTERNAL_ERROR';

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown; details?: unknown }) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = options?.details;
    if (options?.cause) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Participant or block number could not be resolved from a file name. */
export class FilenamePatternError extends AppError {
  constructor(
    public readonly filePath: string,
    public readonly expected: string
  ) {
    super(`Cannot resolve ${expected} from file name: ${filePath}`, 'FILENAME_PATTERN');
  }
}

/** A trial log lacks the rows, columns or numeric values the extraction needs. */
export class MissingDataError extends AppError {
  constructor(
    public readonly filePath: string,
    public readonly missing: string,
    public readonly expected?: string,
    public readonly found?: string
  ) {
    const extra = expected !== undefined ? ` (expected ${expected}, found ${found ?? 'nothing'})` : '';
    super(`Missing data in ${filePath}: ${missing}${extra}`, 'MISSING_DATA');
  }
}

export class IoError extends AppError {
  constructor(
    public readonly filePath: string,
    action: string,
    cause?: unknown
  ) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Cannot ${action} ${filePath}${reason}`, 'IO_ERROR', { cause });
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', { details });
  }
}

export const ensureAppError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof ZodError) {
    return new ConfigError('Invalid configuration', error.flatten());
  }
  if (error instanceof Error) {
    return new AppError(error.message, 'INTERNAL_ERROR', { cause: error });
  }
  return new AppError('Unknown error', 'INTERNAL_ERROR');
};

// Data errors are recoverable under the skip policy; everything else ends the run.
export function isFileError(err: unknown): err is FilenamePatternError | MissingDataError | IoError {
  return err instanceof FilenamePatternError || err instanceof MissingDataError || err instanceof IoError;
}

export function formatError(err: unknown): string {
  const appError = ensureAppError(err);
  if (appError instanceof ConfigError && appError.details !== undefined) {
    return `[${appError.code}] ${appError.message}: ${JSON.stringify(appError.details)}`;
  }
  return `[${appError.code}] ${appError.message}`;
}
