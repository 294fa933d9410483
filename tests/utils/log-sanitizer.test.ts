/**
 * Tests for log sanitization utilities
 */

import { describe, it, expect } from 'vitest';
import {
  hashId,
  logSerializers,
  maskEmail,
  maskPhone,
  redact,
  sanitizeError,
  sanitizeLogObject,
  truncate,
} from '../../src/utils/log-sanitizer.js';

describe('Log Sanitization Utilities', () => {
  describe('hashId', () => {
    it('should keep a four character prefix and an 8 character hash', () => {
      expect(hashId('user-12345')).toMatch(/^user\.\.\.[\da-f]{8}$/);
    });

    it('should be stable per input', () => {
      expect(hashId('user-12345')).toBe(hashId('user-12345'));
      expect(hashId('user-12345')).not.toBe(hashId('user-67890'));
    });

    it('should return null for non-strings', () => {
      expect(hashId(undefined)).toBeNull();
      expect(hashId(42)).toBeNull();
      expect(hashId('')).toBeNull();
    });
  });

  describe('truncate', () => {
    it('should leave short strings alone', () => {
      expect(truncate('short')).toBe('short');
    });

    it('should cut long strings', () => {
      expect(truncate('abcdefghij', 4)).toBe('abcd...[truncated]');
    });
  });

  describe('contact masking', () => {
    it('should keep only the last two digits of a phone number', () => {
      expect(maskPhone('+1 (555) 010-0142')).toBe('***-**42');
      expect(maskPhone('12')).toBe(redact());
    });

    it('should keep the first letter and the domain of an e-mail address', () => {
      expect(maskEmail('dana@example.test')).toBe('d***@example.test');
      expect(maskEmail('@example.test')).toBe('[REDACTED]');
      expect(maskEmail(null)).toBeNull();
    });
  });

  describe('sanitizeError', () => {
    it('should keep name, message and code', () => {
      const error = Object.assign(new Error('Connection refused'), { code: 'ECONNREFUSED' });
      expect(sanitizeError(error)).toEqual({
        name: 'Error',
        message: 'Connection refused',
        code: 'ECONNREFUSED',
      });
    });

    it('should scrub connection strings and addresses from messages', () => {
      const error = new Error('connect postgres://app:test-secret@db:5432/pets failed from 10.0.0.7');
      expect(sanitizeError(error)?.['message']).toBe('connect [REDACTED] failed from [REDACTED]');
    });

    it('should scrub e-mail addresses', () => {
      expect(sanitizeError('bounce for dana@example.test')).toEqual({ message: 'bounce for [REDACTED]' });
    });

    it('should pick known fields from plain objects', () => {
      expect(sanitizeError({ status: 503, message: 'busy', extra: 'dropped' })).toEqual({
        status: 503,
        message: 'busy',
      });
      expect(sanitizeError({})).toEqual({ type: 'unknown' });
      expect(sanitizeError(null)).toBeNull();
    });
  });

  describe('logSerializers', () => {
    it('should redact secrets and mask contacts', () => {
      expect(logSerializers['token']?.('test-secret')).toBe('[REDACTED]');
      expect(logSerializers['phone']?.('555-0199')).toBe('***-**99');
      expect(logSerializers['payload']?.({ big: true })).toBe('[object]');
    });
  });

  describe('sanitizeLogObject', () => {
    it('should apply serializers by key and redact secret-looking keys', () => {
      const result = sanitizeLogObject({
        alertId: 'a-1',
        email: 'sam@example.test',
        sessionToken: 'test-secret',
        count: 3,
      });

      expect(result).toEqual({
        alertId: 'a-1',
        email: 's***@example.test',
        sessionToken: '[REDACTED]',
        count: 3,
      });
    });
  });
});
