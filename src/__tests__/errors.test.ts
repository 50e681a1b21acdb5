import { describe, it, expect } from 'vitest';
import {
  ExtractionError,
  IndexParseError,
  DocumentReadError,
  DocumentDecodeError,
  OutputWriteError,
  ConfigError,
  describeError,
} from '../utils/errors.js';

describe('errors', () => {
  it.each([
    [new IndexParseError('bad name'), 'IndexParseError', 'INDEX_PARSE_FAILED'],
    [new DocumentReadError('no file'), 'DocumentReadError', 'DOCUMENT_READ_FAILED'],
    [new DocumentDecodeError('bad cbor'), 'DocumentDecodeError', 'DOCUMENT_DECODE_FAILED'],
    [new OutputWriteError('no dir'), 'OutputWriteError', 'OUTPUT_WRITE_FAILED'],
    [new ConfigError('bad config'), 'ConfigError', 'INVALID_CONFIG'],
  ])('%s carries its name and code', (error, name, code) => {
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
  });

  it('should keep the context and cause', () => {
    const cause = new Error('EACCES');
    const error = new OutputWriteError('Failed to write out.txt', { outputPath: 'out.txt' }, { cause });

    expect(error.context).toEqual({ outputPath: 'out.txt' });
    expect(error.cause).toBe(cause);
  });

  describe('describeError', () => {
    it('should prefix errors with their name', () => {
      expect(describeError(new IndexParseError('Directory name "abc" does not contain "th"'))).toBe(
        'IndexParseError: Directory name "abc" does not contain "th"'
      );
    });

    it('should stringify non-errors', () => {
      expect(describeError('plain failure')).toBe('plain failure');
      expect(describeError(42)).toBe('42');
    });
  });
});
