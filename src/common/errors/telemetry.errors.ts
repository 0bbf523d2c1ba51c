// src/common/errors/telemetry.errors.ts

export type TelemetryErrorKind =
  | 'connection'
  | 'schema_setup'
  | 'namespace_exists'
  | 'write'
  | 'verification_mismatch'
  | 'query'
  | 'configuration'
  | 'invalid_window';

/**
 * Base class for every failure the pipeline raises on purpose. `kind`
 * lets callers switch exhaustively instead of chaining instanceof.
 */
export abstract class TelemetryError extends Error {
  abstract readonly kind: TelemetryErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Initial connection or health check failed. Fatal to startup. */
export class ConnectionError extends TelemetryError {
  readonly kind = 'connection';
}

/** Collection or index creation failed for a reason other than "already exists". */
export class SchemaSetupError extends TelemetryError {
  readonly kind = 'schema_setup';
}

/** The collection was created by someone else first. */
export class NamespaceExistsError extends TelemetryError {
  readonly kind = 'namespace_exists';

  constructor(readonly collection: string, options?: { cause?: unknown }) {
    super(`Collection "${collection}" already exists`, options);
  }
}

/** A single insert failed; the reading is dropped. */
export class WriteError extends TelemetryError {
  readonly kind = 'write';
}

/** Insert reported success but the read-back found nothing. */
export class VerificationMismatchError extends TelemetryError {
  readonly kind = 'verification_mismatch';

  constructor(readonly id: string) {
    super(`Inserted reading ${id} was not found on read-back`);
  }
}

export class QueryError extends TelemetryError {
  readonly kind = 'query';
}

/** Threshold or retention settings are unusable. */
export class ConfigurationError extends TelemetryError {
  readonly kind = 'configuration';

  constructor(readonly warnings: string[]) {
    super(warnings.join('; '));
  }
}

export class InvalidQueryWindowError extends TelemetryError {
  readonly kind = 'invalid_window';
}
