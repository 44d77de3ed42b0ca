/**
 * Tests for extractErrorMessage
 */

import { describe, it, expect } from 'vitest';
import { extractErrorMessage } from '../../../../src/shared/errors/extract-error-message.js';

describe('extractErrorMessage', () => {
  describe('Error instances', () => {
    it('should extract message from Error instance', () => {
      expect(extractErrorMessage(new Error('Something went wrong'))).toBe('Something went wrong');
    });

    it('should use error name when message is empty', () => {
      const error = new Error('');
      error.name = 'TimeoutError';
      expect(extractErrorMessage(error)).toBe('TimeoutError');
    });

    it('should return "Unknown Error" for Error with no message or name', () => {
      const error = new Error('');
      error.name = '';
      expect(extractErrorMessage(error)).toBe('Unknown Error');
    });
  });

  describe('string errors', () => {
    it('should return string as-is', () => {
      expect(extractErrorMessage('Plain string error')).toBe('Plain string error');
    });
  });

  describe('error-like objects', () => {
    it('should extract .message property from object', () => {
      expect(extractErrorMessage({ message: 'Object with message' })).toBe('Object with message');
    });

    it('should extract .reason property from object', () => {
      expect(extractErrorMessage({ reason: 'Target closed' })).toBe('Target closed');
    });

    it('should prefer .message over .reason', () => {
      expect(extractErrorMessage({ message: 'message wins', reason: 'reason loses' })).toBe(
        'message wins'
      );
    });

    it('should stringify objects without known properties', () => {
      expect(extractErrorMessage({ code: 123 })).toBe('{"code":123}');
    });

    it('should stringify a non-string message property', () => {
      expect(extractErrorMessage({ message: 123 })).toBe('{"message":123}');
    });

    it('should describe empty objects', () => {
      expect(extractErrorMessage({})).toBe('Unknown error object');
    });

    it('should handle circular reference objects', () => {
      const error: Record<string, unknown> = { name: 'circular' };
      error.self = error;

      expect(extractErrorMessage(error)).toBe('Non-serializable error: [object Object]');
    });
  });

  describe('primitives', () => {
    it('should stringify primitives', () => {
      expect(extractErrorMessage(null)).toBe('null');
      expect(extractErrorMessage(undefined)).toBe('undefined');
      expect(extractErrorMessage(42)).toBe('42');
      expect(extractErrorMessage(false)).toBe('false');
    });
  });
});
