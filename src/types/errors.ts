/**
 * Error taxonomy shared by the gateway and the resolver.
 *
 * Each variant carries a literal `kind`; callers switch on it rather than on
 * the class. Variants only extend Error, never each other.
 */

export class RemoteUnavailableError extends Error {
  readonly kind = 'RemoteUnavailable' as const;

  constructor(readonly endpoint: string, cause: unknown) {
    super(`Jdbc2Ei server not available at ${endpoint}: ${describeCause(cause)}`, { cause });
    this.name = 'RemoteUnavailableError';
  }
}

export class RemoteQueryError extends Error {
  readonly kind = 'RemoteQueryError' as const;

  /**
   * @param code - sentinel returned instead of rows; null when the bridge raised a fault
   */
  constructor(readonly code: number | null, readonly statement: string, cause?: unknown) {
    super(`The FEWS jdbc query [${statement}] returned error code ${code ?? 'fault'}`, { cause });
    this.name = 'RemoteQueryError';
  }
}

export class SchemaMismatchError extends Error {
  readonly kind = 'SchemaMismatch' as const;

  constructor(message: string) {
    super(message);
    this.name = 'SchemaMismatchError';
  }
}

export class NotFoundError extends Error {
  readonly kind = 'NotFound' as const;

  constructor(readonly what: string, readonly key: string) {
    super(`No ${what} found for '${key}'`);
    this.name = 'NotFoundError';
  }
}

export class MalformedTimestampError extends Error {
  readonly kind = 'MalformedTimestamp' as const;

  constructor(readonly raw: string) {
    super(`Cannot parse remote timestamp '${raw}'`);
    this.name = 'MalformedTimestampError';
  }
}

export class InvalidRangeError extends Error {
  readonly kind = 'InvalidRange' as const;

  constructor(readonly startDate: Date, readonly endDate: Date) {
    super(`Start date ${startDate.toISOString()} is after end date ${endDate.toISOString()}`);
    this.name = 'InvalidRangeError';
  }
}

export type ResolverError =
  | RemoteUnavailableError
  | RemoteQueryError
  | SchemaMismatchError
  | NotFoundError
  | MalformedTimestampError
  | InvalidRangeError;

export type ResolverErrorKind = ResolverError['kind'];

export function isResolverError(value: unknown): value is ResolverError {
  return (
    value instanceof RemoteUnavailableError ||
    value instanceof RemoteQueryError ||
    value instanceof SchemaMismatchError ||
    value instanceof NotFoundError ||
    value instanceof MalformedTimestampError ||
    value instanceof InvalidRangeError
  );
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
