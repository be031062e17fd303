import { describe, it, expect } from 'vitest';
import { DocumentError, DocumentErrorCode, OutOfRangeError } from '../errors.js';

describe('OutOfRangeError', () => {
  it('should carry the value and bounds', () => {
    const error = new OutOfRangeError(-9007199254740993n);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('OutOfRangeError');
    expect(error.value).toBe(-9007199254740993n);
    expect(error.min).toBe(-9007199254740992n);
    expect(error.max).toBe(9007199254740992n);
    expect(error.message).toBe(
      'Integer -9007199254740993 is outside the double-int range [-9007199254740992, 9007199254740992]'
    );
  });
});

describe('DocumentError', () => {
  it('should format details with their paths', () => {
    const error = new DocumentError('Document validation failed', DocumentErrorCode.VALIDATION_ERROR, [
      { message: 'Integer out of range', path: ['limits', 0, 'count'] },
      { message: 'Required', path: [] },
    ]);

    expect(error.format()).toBe(
      [
        'Error: Document validation failed',
        '',
        'Details:',
        '  - Integer out of range at limits.0.count',
        '  - Required',
      ].join('\n')
    );
  });

  it('should format without details', () => {
    const error = new DocumentError('YAML syntax error', DocumentErrorCode.SYNTAX_ERROR);
    expect(error.details).toEqual([]);
    expect(error.format()).toBe('Error: YAML syntax error');
    expect(error).toBeInstanceOf(DocumentError);
  });
});
