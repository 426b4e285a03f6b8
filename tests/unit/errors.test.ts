/**
 * Error Classes Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  KeyServiceError,
  ConfigError,
  InvalidBaseURLError,
  UnsupportedSchemeError,
  RequestConstructionError,
} from '../../src/utils/errors';

describe('Error Classes', () => {
  describe('KeyServiceError', () => {
    it('should create error with message and code', () => {
      const error = new KeyServiceError('Test error', 'TEST_CODE');

      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.details).toBeUndefined();
      expect(error.name).toBe('KeyServiceError');
      expect(error).toBeInstanceOf(Error);
    });

    it('should create error with details', () => {
      const details = { baseURL: 'https://keys.sylabs.io' };
      const error = new KeyServiceError('Test error', 'TEST_CODE', details);
      expect(error.details).toEqual(details);
    });
  });

  describe('ConfigError', () => {
    it('should carry the validation issues', () => {
      const error = new ConfigError('Invalid config', ['baseURL: Expected string']);

      expect(error.code).toBe('CONFIG_INVALID');
      expect(error.errors).toEqual(['baseURL: Expected string']);
      expect(error.details).toEqual({ errors: ['baseURL: Expected string'] });
      expect(error).toBeInstanceOf(KeyServiceError);
    });

    it('should default to no issues', () => {
      expect(new ConfigError('Invalid config').errors).toEqual([]);
    });
  });

  describe('InvalidBaseURLError', () => {
    it('should name the unparseable URL', () => {
      const error = new InvalidBaseURLError('not a url');

      expect(error.message).toBe('invalid base URL "not a url"');
      expect(error.code).toBe('INVALID_BASE_URL');
      expect(error.details).toEqual({ baseURL: 'not a url' });
      expect(error.name).toBe('InvalidBaseURLError');
    });
  });

  describe('UnsupportedSchemeError', () => {
    it('should carry the offending scheme', () => {
      const error = new UnsupportedSchemeError('ftp');

      expect(error.message).toBe('unsupported protocol scheme "ftp"');
      expect(error.code).toBe('UNSUPPORTED_SCHEME');
      expect(error.scheme).toBe('ftp');
      expect(error.details).toEqual({ scheme: 'ftp' });
      expect(error).toBeInstanceOf(KeyServiceError);
    });
  });

  describe('RequestConstructionError', () => {
    it('should create error with default code', () => {
      const error = new RequestConstructionError('invalid method "BAD METHOD"', {
        method: 'BAD METHOD',
      });

      expect(error.code).toBe('REQUEST_CONSTRUCTION_FAILED');
      expect(error.details).toEqual({ method: 'BAD METHOD' });
      expect(error.stack).toContain('RequestConstructionError');
    });
  });
});
