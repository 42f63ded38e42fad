import { describe, expect, it } from 'vitest';

import { getErrorMessage, isErrnoException, isErrorWithMessage, toError } from '../type-guard-utils.js';

describe('Type Guard Utilities', () => {
  describe('isErrorWithMessage', () => {
    it('should return true for Error instances and subclasses', () => {
      expect(isErrorWithMessage(new Error('Test error'))).toBe(true);
      expect(isErrorWithMessage(new TypeError('Type error'))).toBe(true);
      expect(isErrorWithMessage(new Error(''))).toBe(true);
    });

    it('should return false for non-Error values', () => {
      expect(isErrorWithMessage('error string')).toBe(false);
      expect(isErrorWithMessage(undefined)).toBe(false);
      expect(isErrorWithMessage({ message: 'not an error' })).toBe(false);
    });
  });

  describe('getErrorMessage', () => {
    it('should extract message from Error instances', () => {
      expect(getErrorMessage(new Error('Test error message'))).toBe('Test error message');
    });

    it('should return string representation of non-Error values', () => {
      expect(getErrorMessage('string error')).toBe('string error');
      expect(getErrorMessage(123)).toBe('123');
      expect(getErrorMessage(undefined)).toBe('undefined');
    });

    it('should use default message only for non-Error values', () => {
      expect(getErrorMessage(null, 'default message')).toBe('default message');
      expect(getErrorMessage(new Error('actual error'), 'default message')).toBe('actual error');
    });
  });

  describe('toError', () => {
    it('should return Error instances unchanged', () => {
      const error = new RangeError('out of range');
      expect(toError(error)).toBe(error);
    });

    it('should wrap other values', () => {
      const error = toError('plain failure');
      expect(error).toBeInstanceOf(Error);
      expect(error.message).toBe('plain failure');
    });
  });

  describe('isErrnoException', () => {
    it('should recognise errors carrying a string code', () => {
      const error = Object.assign(new Error('no such file'), { code: 'ENOENT' });
      expect(isErrnoException(error)).toBe(true);
    });

    it('should reject errors without a code', () => {
      expect(isErrnoException(new Error('plain'))).toBe(false);
      expect(isErrnoException({ code: 'ENOENT' })).toBe(false);
    });
  });
});
