import { z } from 'zod';
import {
  AppError,
  ConfigError,
  FilenamePatternError,
  IoError,
  MissingDataError,
  ensureAppError,
  formatError,
  isFileError
} from '../errors.js';

describe('errors', () => {
  it('keeps subclass identity and codes', () => {
    const err = new MissingDataError('/d/a.csv', 'rows 121-160', 'at least 160 data rows', '150');
    expect(err).toBeInstanceOf(AppError);
    expect(err).toBeInstanceOf(MissingDataError);
    expect(err.name).toBe('MissingDataError');
    expect(err.code).toBe('MISSING_DATA');
  });

  it('names the file and the expectation in filename errors', () => {
    const err = new FilenamePatternError('/d/subject_P01_final.csv', 'block number');
    expect(err.message).toBe('Cannot resolve block number from file name: /d/subject_P01_final.csv');
  });

  it('includes the underlying cause in IO errors', () => {
    const err = new IoError('/d/out.csv', 'write results to', new Error('EACCES'));
    expect(err.message).toBe('Cannot write results to /d/out.csv: EACCES');
    expect(err.cause).toBeInstanceOf(Error);
  });

  it('wraps foreign errors', () => {
    expect(ensureAppError(new Error('boom')).code).toBe('INTERNAL_ERROR');
    expect(ensureAppError('boom').message).toBe('Unknown error');
    const zodError = z.object({ a: z.number() }).safeParse({ a: 'x' });
    expect(zodError.success).toBe(false);
    if (!zodError.success) {
      expect(ensureAppError(zodError.error)).toBeInstanceOf(ConfigError);
    }
  });

  it('formats errors for the operator', () => {
    expect(formatError(new FilenamePatternError('/d/x.csv', 'block number'))).toBe(
      '[FILENAME_PATTERN] Cannot resolve block number from file name: /d/x.csv'
    );
    expect(formatError(new ConfigError('Invalid configuration', { fieldErrors: { a: ['bad'] } }))).toBe(
      '[CONFIG_ERROR] Invalid configuration: {"fieldErrors":{"a":["bad"]}}'
    );
  });

  it('distinguishes per-file errors from run errors', () => {
    expect(isFileError(new MissingDataError('/d/a.csv', 'x'))).toBe(true);
    expect(isFileError(new ConfigError('bad'))).toBe(false);
  });
});
