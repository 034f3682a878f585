export type HealthExportErrorCode =
  | 'MALFORMED_INPUT'
  | 'INPUT_NOT_FOUND'
  | 'DESTINATION_WRITE'
  | 'INVALID_FAMILY'
  | 'SCHEMA_MISMATCH';

export class HealthExportError extends Error {
  readonly code: HealthExportErrorCode;
  readonly details?: unknown;

  constructor(code: HealthExportErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/**
 * The export is not well-formed markup (truncated, bad encoding, ...).
 * Fatal: output of the failing run is discarded.
 */
export class MalformedInputError extends HealthExportError {
  constructor(readonly path: string, reason: string, details?: unknown) {
    super('MALFORMED_INPUT', `Malformed export ${path}: ${reason}`, details);
  }
}

export class InputNotFoundError extends HealthExportError {
  constructor(readonly path: string, details?: unknown) {
    super('INPUT_NOT_FOUND', `Export not found: ${path}`, details);
  }
}

export class DestinationWriteError extends HealthExportError {
  constructor(readonly path: string, details?: unknown) {
    super(
      'DESTINATION_WRITE',
      `Cannot write destination ${path}${details instanceof Error ? `: ${details.message}` : ''}`,
      details
    );
  }
}

export class InvalidFamilyError extends HealthExportError {
  constructor(readonly family: string) {
    super('INVALID_FAMILY', `Unknown family "${family}" (expected records, workouts or activity)`);
  }
}

/**
 * A recognized entry lacks a field its family requires.
 * Never escapes `extract`; the entry is skipped and counted.
 */
export class SchemaMismatchError extends HealthExportError {
  constructor(readonly tag: string, readonly field: string, reason?: string) {
    super('SCHEMA_MISMATCH', `${tag} entry skipped: ${reason ?? `missing required field "${field}"`}`);
  }
}
