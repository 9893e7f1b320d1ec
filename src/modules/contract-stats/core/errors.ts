/**
 * Domain errors for the contract stats module.
 */

import type { ValidationError } from '../../../common/types/errors.js';

import type { ValueError } from '@sinclair/typebox/errors';

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface ParseError {
  readonly type: 'ParseError';
  readonly message: string;
  readonly field: 'amount' | 'row';
  readonly value: string;
  /** 1-based line number within the export body, when known */
  readonly line?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface NetworkError {
  readonly type: 'NetworkError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

export interface TimeoutError {
  readonly type: 'TimeoutError';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

export interface HttpStatusError {
  readonly type: 'HttpStatusError';
  readonly message: string;
  readonly status: number;
  readonly retryable: boolean;
}

export type ProviderError = NetworkError | TimeoutError | HttpStatusError;

export interface WriteError {
  readonly type: 'WriteError';
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}

export type ReferenceDataError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] };

// ─────────────────────────────────────────────────────────────────────────────
// Error Unions
// ─────────────────────────────────────────────────────────────────────────────

export type RunError = ParseError | WriteError;

export type ContractStatsError = ParseError | ProviderError | WriteError | ValidationError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createParseError = (
  field: ParseError['field'],
  value: string,
  message: string
): ParseError => ({
  type: 'ParseError',
  message,
  field,
  value,
});

export const withLine = (error: ParseError, line: number): ParseError => ({
  ...error,
  message: `Line ${String(line)}: ${error.message}`,
  line,
});

export const createNetworkError = (message: string, cause?: unknown): NetworkError => ({
  type: 'NetworkError',
  message,
  retryable: true,
  cause,
});

export const createTimeoutError = (message: string, cause?: unknown): TimeoutError => ({
  type: 'TimeoutError',
  message,
  retryable: true,
  cause,
});

export const createHttpStatusError = (status: number, message: string): HttpStatusError => ({
  type: 'HttpStatusError',
  message,
  status,
  retryable: status >= 500,
});

export const createWriteError = (path: string, message: string, cause?: unknown): WriteError => ({
  type: 'WriteError',
  message,
  path,
  cause,
});

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);
