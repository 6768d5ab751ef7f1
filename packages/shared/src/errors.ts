// ─── Validation Errors ───────────────────────────────────
// Returned as values. Nothing in the protocol core throws on bad input.

export type ValidationErrorCode =
  | 'unknown_preset'
  | 'invalid_field'
  | 'unknown_location'
  | 'out_of_range'
  | 'malformed_node'
  | 'missing_group_id'
  | 'duplicate_group'
  | 'unknown_group';

export class ValidationError extends Error {
  public readonly code: ValidationErrorCode;
  public readonly field?: string;

  constructor(code: ValidationErrorCode, message: string, field?: string) {
    super(message);
    this.name = 'ValidationError';
    this.code = code;
    this.field = field;
  }
}

export type Result<T, E = ValidationError> =
  | { ok: true; value: T; error?: undefined }
  | { ok: false; error: E; value?: undefined };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E = ValidationError>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** A validation error tied to where it happened inside a scene update. */
export interface SceneDiagnostic {
  groupId: string | null;
  /** Index of the offending node inside its group's input, when node-level. */
  nodeIndex: number | null;
  code: ValidationErrorCode;
  message: string;
}

export function toDiagnostic(
  error: ValidationError,
  groupId: string | null,
  nodeIndex: number | null = null,
): SceneDiagnostic {
  return { groupId, nodeIndex, code: error.code, message: error.message };
}
