/**
 * Errors Module
 *
 * Taxonomy:
 * - MalformedRowError: unusable input row, row skipped, run continues
 * - ProviderError: transport/provider failure, retried then recorded as row failure
 * - ParseError: provider returned an unusable shape, recorded as row failure, never retried
 * - StoreError: persistence unavailable, fatal for the run
 * - RunAbortedError: run cancelled by its caller
 */

import type { ResultError, ResultErrorCode } from '../types/index.js';

export type PipelineErrorCode =
  | 'MALFORMED_ROW'
  | 'PROVIDER_ERROR'
  | 'PARSE_ERROR'
  | 'STORE_ERROR'
  | 'RUN_ABORTED';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MalformedRowError extends PipelineError {
  readonly code = 'MALFORMED_ROW';

  constructor(
    message: string,
    readonly rowIndex: number,
    readonly csvLine: number
  ) {
    super(message);
  }
}

export class ProviderError extends PipelineError {
  readonly code = 'PROVIDER_ERROR';

  constructor(
    message: string,
    readonly provider: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ParseError extends PipelineError {
  readonly code = 'PARSE_ERROR';

  constructor(
    message: string,
    readonly responsePreview: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class StoreError extends PipelineError {
  readonly code = 'STORE_ERROR';

  constructor(
    message: string,
    readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class RunAbortedError extends PipelineError {
  readonly code = 'RUN_ABORTED';

  constructor(message = 'Run aborted') {
    super(message);
  }
}

/**
 * Reduce any thrown value to the error detail stored on a failed result
 */
export function toResultError(error: unknown): ResultError {
  let code: ResultErrorCode = 'UNEXPECTED_ERROR';
  if (error instanceof ProviderError) code = 'PROVIDER_ERROR';
  else if (error instanceof ParseError) code = 'PARSE_ERROR';
  else if (error instanceof RunAbortedError) code = 'RUN_ABORTED';

  return {
    code,
    message: errorMessage(error),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
