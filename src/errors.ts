/**
 * Error taxonomy for the departures pipeline
 *
 * UpstreamError and NormalizationError are raised inside the pipeline.
 * DepartureService converts both into DepartureLookupError, the only error
 * the HTTP layer maps to a response.
 */

export type UpstreamErrorKind = 'BadStatus' | 'Unreachable';

export class UpstreamError extends Error {
  readonly kind: UpstreamErrorKind;
  readonly detail: string;
  readonly status?: number;

  constructor(kind: UpstreamErrorKind, detail: string, status?: number) {
    super(`Transit API request failed (${kind}): ${detail}`);
    this.name = 'UpstreamError';
    this.kind = kind;
    this.detail = detail;
    this.status = status;
  }
}

export class NormalizationError extends Error {
  readonly detail: string;

  constructor(detail: string) {
    super(`Transit API response could not be normalized: ${detail}`);
    this.name = 'NormalizationError';
    this.detail = detail;
  }
}

export type DepartureLookupErrorKind =
  | 'NotFound'
  | 'BadUpstreamStatus'
  | 'UpstreamUnreachable'
  | 'ParseFailure';

export class DepartureLookupError extends Error {
  readonly kind: DepartureLookupErrorKind;
  readonly status: number;
  readonly detail: string;

  private constructor(
    kind: DepartureLookupErrorKind,
    status: number,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(detail, options);
    this.name = 'DepartureLookupError';
    this.kind = kind;
    this.status = status;
    this.detail = detail;
  }

  static notFound(): DepartureLookupError {
    return new DepartureLookupError(
      'NotFound',
      404,
      'No stops matching the query were found.'
    );
  }

  static badUpstreamStatus(upstreamStatus: number | undefined, cause?: unknown): DepartureLookupError {
    return new DepartureLookupError(
      'BadUpstreamStatus',
      502,
      `Request to HSL API failed with code ${upstreamStatus ?? 'unknown'}.`,
      { cause }
    );
  }

  static upstreamUnreachable(cause?: unknown): DepartureLookupError {
    return new DepartureLookupError(
      'UpstreamUnreachable',
      500,
      'Unexpected error when fetching data from HSL.',
      { cause }
    );
  }

  static parseFailure(cause?: unknown): DepartureLookupError {
    return new DepartureLookupError(
      'ParseFailure',
      500,
      'Received response from HSL API but failed to parse it.',
      { cause }
    );
  }
}
