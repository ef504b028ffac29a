import { HttpStatus } from '@nestjs/common';

export type DecayAuditErrorCode = 'CONFIGURATION_ERROR' | 'FETCH_ERROR';

/**
 * Base class for failures that abort an audit run
 */
export abstract class DecayAuditError extends Error {
  abstract readonly code: DecayAuditErrorCode;
  abstract readonly statusCode: HttpStatus;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid window, weight or threshold parameters. Raised before any fetch.
 */
export class ConfigurationError extends DecayAuditError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly statusCode = HttpStatus.BAD_REQUEST;
}

export type FetchWindow = 'recent' | 'past' | 'sites';

/**
 * Network, API or auth failure surfaced by the metric fetch adapter
 */
export class FetchError extends DecayAuditError {
  readonly code = 'FETCH_ERROR';
  readonly statusCode = HttpStatus.BAD_GATEWAY;

  constructor(
    message: string,
    readonly siteUrl: string,
    readonly window?: FetchWindow,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  /**
   * Same failure, labeled with the window it was fetched for
   */
  forWindow(window: FetchWindow): FetchError {
    return new FetchError(this.message, this.siteUrl, window, {
      cause: this.cause,
    });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
