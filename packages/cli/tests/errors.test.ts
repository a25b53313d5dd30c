import { describe, it, expect } from 'vitest';
import {
  BuilderError,
  ErrorCodes,
  ErrorRemediation,
  ParseError,
  ValidationError,
  isBuilderError,
  wrapError,
} from '../src/lib/errors.js';

const violation = (path: string, message: string) => ({ code: 'TEST', path, message });

describe('errors', () => {
  it('uses the single violation as the message', () => {
    const error = new ValidationError([violation('products', 'at least one product required')]);
    expect(error.message).toBe('at least one product required');
    expect(error.code).toBe(ErrorCodes.DOCUMENT_INVALID);
  });

  it('counts several violations', () => {
    const error = new ValidationError([violation('a', 'first'), violation('b', 'second')]);
    expect(error.message).toBe('2 problems found');
    expect(error.violations).toHaveLength(2);
    expect(error.details).toEqual(error.violations);
  });

  it('formats the code in user output', () => {
    const error = new ParseError('Document is empty');
    expect(error.toUserString()).toBe('[GC_DOCUMENT_202] Document is empty');
    expect(error.issues).toEqual([]);
    expect(isBuilderError(error)).toBe(true);
  });

  it('serializes to JSON with remediation', () => {
    const error = new BuilderError(ErrorCodes.CATALOG_NOT_FOUND);
    expect(error.toJSON()).toEqual({
      code: 'GC_CATALOG_101',
      message: 'No policy catalog available',
      remediation: ErrorRemediation[ErrorCodes.CATALOG_NOT_FOUND],
      details: undefined,
      cause: undefined,
    });
  });

  it('wraps unknown errors and passes builder errors through', () => {
    const original = new ParseError('bad');
    expect(wrapError(original, ErrorCodes.IO_READ_ERROR)).toBe(original);

    const wrapped = wrapError(new Error('EACCES'), ErrorCodes.IO_READ_ERROR, 'Failed to read config.yaml');
    expect(wrapped.code).toBe(ErrorCodes.IO_READ_ERROR);
    expect(wrapped.message).toBe('Failed to read config.yaml');
    expect(wrapped.cause?.message).toBe('EACCES');
  });

  it('defines only the codes the builder raises, each with a message and remediation', () => {
    expect(Object.values(ErrorCodes)).toEqual([
      'GC_CONFIG_002',
      'GC_CATALOG_101',
      'GC_CATALOG_102',
      'GC_CATALOG_103',
      'GC_DOCUMENT_201',
      'GC_DOCUMENT_202',
      'GC_IO_301',
      'GC_IO_302',
      'GC_IO_304',
      'GC_CLI_401',
    ]);
    for (const code of Object.values(ErrorCodes)) {
      expect(new BuilderError(code).message).not.toBe('');
      expect(ErrorRemediation[code]).not.toBe('');
    }
  });
});
