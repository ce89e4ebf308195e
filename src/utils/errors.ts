/**
 * Error types and codes for tagcase.
 * All errors thrown by the project extend TagCaseError.
 */

/**
 * Base error class for all tagcase errors.
 */
export class TagCaseError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TagCaseError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends TagCaseError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (file not found, parse errors, missing syntax tree).
 * The engine turns them into a failed result for the file they come from.
 */
export class SystemError extends TagCaseError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * A rule names a convention that has no converter.
 */
export class ConventionError extends TagCaseError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConventionError';
  }
}

/**
 * A field's name or type shape could not be derived from its type expression.
 */
export class FieldResolutionError extends TagCaseError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'FieldResolutionError';
  }
}

export const ErrorCodes = {
  // Diagnostics (T001-T004)
  CASE_MISMATCH: 'T001',
  UNSUPPORTED_CASE: 'T002',
  FIELD_NAME: 'T003',
  FIELD_TYPE: 'T004',

  // System errors (S001-S004)
  PARSE_ERROR: 'S001',
  MISSING_SYNTAX_TREE: 'S002',
  READ_ERROR: 'S003',
  WRITE_ERROR: 'S004',

  // Configuration errors (C001-C003)
  CONFIG_LOAD_ERROR: 'C001',
  CONFIG_INVALID: 'C002',
  INVALID_RULE_OPTION: 'C003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
