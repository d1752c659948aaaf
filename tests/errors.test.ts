/**
 * Tests for error classes
 */

import { describe, it, expect } from 'vitest';
import {
  PipelineError,
  FetchError,
  BackendError,
  ParseError,
  MalformedStoreError,
  PersistError,
  KeyPathError,
  ConfigError,
  errorMessage,
} from '../src/pipeline/errors';

describe('Error Classes', () => {
  describe('PipelineError', () => {
    it('should create basic error', () => {
      const error = new PipelineError('Test error', 'test_error');
      expect(error.message).toBe('Test error');
      expect(error.name).toBe('PipelineError');
      expect(error.code).toBe('test_error');
      expect(error.details).toBeUndefined();
    });

    it('should keep the cause', () => {
      const cause = new Error('root');
      const error = new PipelineError('Wrapped', 'wrapped', { field: 'value' }, { cause });
      expect(error.cause).toBe(cause);
      expect(error.details).toEqual({ field: 'value' });
    });

    it('should format toString correctly', () => {
      expect(new PipelineError('Test error', 'test_error').toString()).toBe(
        'PipelineError: Test error (code: test_error)'
      );
    });
  });

  describe('Specific Error Types', () => {
    it('should create FetchError', () => {
      const error = new FetchError('No captions', 'transcripts-disabled', { videoId: 'abc123' });
      expect(error).toBeInstanceOf(PipelineError);
      expect(error.name).toBe('FetchError');
      expect(error.code).toBe('fetch_failed');
      expect(error.kind).toBe('transcripts-disabled');
      expect(error.details).toEqual({ kind: 'transcripts-disabled', videoId: 'abc123' });
    });

    it('should create BackendError', () => {
      const error = new BackendError('Quota exceeded', 429);
      expect(error.name).toBe('BackendError');
      expect(error.status).toBe(429);
      expect(error.details).toEqual({ status: 429 });
      expect(new BackendError('Offline').details).toBeUndefined();
    });

    it('should create ParseError', () => {
      const error = new ParseError('Unreadable', 'not json');
      expect(error.raw).toBe('not json');
      expect(error.details).toEqual({ length: 8 });
    });

    it('should create MalformedStoreError', () => {
      const error = new MalformedStoreError('Bad file', '/tmp/store.json');
      expect(error.code).toBe('store_malformed');
      expect(error.path).toBe('/tmp/store.json');
    });

    it('should create PersistError', () => {
      const error = new PersistError('Write failed', '/tmp/store.json', '/tmp/store.json.bak');
      expect(error.code).toBe('persist_failed');
      expect(error.backupPath).toBe('/tmp/store.json.bak');
    });

    it('should create KeyPathError', () => {
      const error = new KeyPathError('Not a mapping', ['abc', 'summary']);
      expect(error.keyPath).toEqual(['abc', 'summary']);
      expect(error.details).toEqual({ keyPath: ['abc', 'summary'] });
    });

    it('should create ConfigError', () => {
      const error = new ConfigError('Missing key');
      expect(error).toBeInstanceOf(PipelineError);
      expect(error.code).toBe('config_invalid');
    });
  });

  describe('errorMessage', () => {
    it('should read messages from errors and other values', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage('plain')).toBe('plain');
      expect(errorMessage(42)).toBe('42');
    });
  });
});
