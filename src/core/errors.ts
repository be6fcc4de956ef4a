/*
Purpose: core error types used across the query engine, data sources and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new InvalidQueryError("...", { field }); throw new UserFacingError({ code, title, message, hint, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class CuraviewError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "CuraviewError";
  }
}

export class ConfigError extends CuraviewError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class DataSourceError extends CuraviewError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DataSourceError";
  }
}

export type InvalidQueryDetails = {
  /** Dotted location of the rejected input, e.g. `sort.0.field`. */
  field?: string;
  allowed?: string[];
};

export class InvalidQueryError extends CuraviewError {
  public readonly details: InvalidQueryDetails;

  constructor(message: string, details: InvalidQueryDetails = {}, cause?: unknown) {
    super(message, cause);
    this.name = "InvalidQueryError";
    this.details = details;
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  invalidQuery: "INVALID_QUERY",
  dataSource: "DATA_SOURCE_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.cause = input.cause;
  }
}
