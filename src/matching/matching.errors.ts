export enum OracleErrorKind {
  ORACLE_UNAVAILABLE = 'ORACLE_UNAVAILABLE',
  MALFORMED_ORACLE_RESPONSE = 'MALFORMED_ORACLE_RESPONSE',
  INVALID_SCORE_RANGE = 'INVALID_SCORE_RANGE',
}

export abstract class OracleError extends Error {
  abstract readonly kind: OracleErrorKind;
}

/** The oracle could not be reached, timed out, or its circuit is open. */
export class OracleUnavailableError extends OracleError {
  readonly kind = OracleErrorKind.ORACLE_UNAVAILABLE;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OracleUnavailableError';
  }
}

/** The oracle answered, but not with the structure we asked for. */
export class MalformedOracleResponseError extends OracleError {
  readonly kind = OracleErrorKind.MALFORMED_ORACLE_RESPONSE;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedOracleResponseError';
  }
}

/** Raised when a profile carries nothing the analyzer could characterize. */
export class InvalidCompanyProfileError extends Error {
  constructor(readonly companyId: string) {
    super(`Company profile ${companyId} has no descriptive fields to analyze`);
    this.name = 'InvalidCompanyProfileError';
  }
}

/**
 * Maps any thrown value onto the oracle taxonomy. Errors that are not
 * already classified count as the oracle being unavailable.
 */
export function toOracleError(error: unknown): OracleError {
  if (error instanceof OracleError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new OracleUnavailableError(message, { cause: error });
}

/** True for kinds that mean no score was obtained at all. */
export function isScoringFailure(kind: OracleErrorKind | null | undefined): boolean {
  return (
    kind === OracleErrorKind.ORACLE_UNAVAILABLE ||
    kind === OracleErrorKind.MALFORMED_ORACLE_RESPONSE
  );
}
