import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AnalysisError';
  }
}

/**
 * Raised when a run has no usable article at all. This is the only failure
 * that aborts an analysis; everything else degrades per item.
 */
export class InsufficientDataError extends AnalysisError {
  constructor(details?: { supplied: number; skipped: number }) {
    super('No usable news articles were supplied for the analysis run.', ErrorCode.InvalidParams, details);
    this.name = 'InsufficientDataError';
  }
}

export class NewsSourceError extends AnalysisError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.InternalError, details);
    this.name = 'NewsSourceError';
  }
}

/** Per-record ingestion failure; collected for the report, never thrown. */
export interface MalformedArticle {
  kind: 'MalformedArticle';
  index: number;
  id?: string;
  reason: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
