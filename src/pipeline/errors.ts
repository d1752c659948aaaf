/**
 * Error classes for the digest pipeline
 */

import type { TranscriptErrorKind } from './types';

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  code: string;
  details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.name}: ${this.message} (code: ${this.code})`;
  }
}

export type FetchErrorKind = TranscriptErrorKind | 'catalog-failed';

/**
 * Transcript or catalog could not be retrieved
 */
export class FetchError extends PipelineError {
  kind: FetchErrorKind;

  constructor(message: string, kind: FetchErrorKind, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'fetch_failed', { kind, ...details }, options);
    this.name = 'FetchError';
    this.kind = kind;
  }
}

/**
 * Generation backend rejected the request (auth, quota, transport)
 */
export class BackendError extends PipelineError {
  status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, 'backend_failed', status === undefined ? undefined : { status }, options);
    this.name = 'BackendError';
    this.status = status;
  }
}

/**
 * Every repair attempt failed to produce structured data
 */
export class ParseError extends PipelineError {
  raw: string;

  constructor(message: string, raw: string) {
    super(message, 'parse_failed', { length: raw.length });
    this.name = 'ParseError';
    this.raw = raw;
  }
}

/**
 * A persisted document exists but is not a JSON object
 */
export class MalformedStoreError extends PipelineError {
  path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, 'store_malformed', { path }, options);
    this.name = 'MalformedStoreError';
    this.path = path;
  }
}

/**
 * Writing a document failed; the previous file was copied to backupPath first
 */
export class PersistError extends PipelineError {
  path: string;
  backupPath?: string;

  constructor(message: string, path: string, backupPath?: string, options?: { cause?: unknown }) {
    super(message, 'persist_failed', { path, backupPath }, options);
    this.name = 'PersistError';
    this.path = path;
    this.backupPath = backupPath;
  }
}

export class KeyPathError extends PipelineError {
  keyPath: readonly string[];

  constructor(message: string, keyPath: readonly string[]) {
    super(message, 'key_path_invalid', { keyPath: [...keyPath] });
    this.name = 'KeyPathError';
    this.keyPath = keyPath;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'config_invalid', details);
    this.name = 'ConfigError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
