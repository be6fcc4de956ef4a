/*
Purpose: map engine errors to user-facing lines and provide ANSI styling helpers for the CLI.
Assumptions: debug mode may include stack traces; non-TTY output disables color.
Usage: formatErrorLines(err, { mode: "debug" }); createAnsiFormatter(resolveColorEnabled({ stream })).
*/

import {
  ConfigError,
  DataSourceError,
  InvalidQueryError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind = "title" | "message" | "hint" | "code" | "name" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    return `${styles.map((style) => ANSI_STYLES[style]).join("")}${value}${ANSI_RESET}`;
  };
}

export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const stream = options.stream ?? process.stderr;
  const isTty = Boolean(stream.isTTY);
  return (options.useColor ?? true) && isTty;
}

// =============================================================================
// ERROR MAPPING
// =============================================================================

const INVALID_QUERY_HINT = "Sortable and filterable fields: identifier, purl, processedDeclaredLicense.";

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof InvalidQueryError) {
    const allowed = error.details.allowed;
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.invalidQuery,
      title: "Invalid package query.",
      message: error.message,
      hint: allowed && allowed.length > 0 ? `Allowed values: ${allowed.join(", ")}.` : INVALID_QUERY_HINT,
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Configuration error.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof DataSourceError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.dataSource,
      title: "Package data unavailable.",
      message: error.message,
      cause: error,
    });
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: normalizeOptionalText(formatErrorMessage(error)) ?? DEFAULT_ERROR_MESSAGE,
    cause: error instanceof Error ? error.cause : undefined,
  });
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(error: unknown, options: ErrorFormatOptions = {}): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const normalized = normalizeInput(toUserFacingError(error));
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message.trim() !== normalized.title.trim()) {
    lines.push({ kind: "message", text: normalized.message });
  }
  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }

  if (mode === "debug") {
    lines.push({ kind: "code", text: normalized.code });

    if (error instanceof Error) {
      lines.push({ kind: "name", text: error.name });
    }

    const cause = resolveCauseMessage(normalized.cause, normalized.message);
    if (cause) {
      lines.push({ kind: "cause", text: cause });
    }

    if (error instanceof Error && error.stack) {
      lines.push({ kind: "stack", text: error.stack });
    }
  }

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return normalizeOptionalText(error.message) ?? error.name;
  }

  if (typeof error === "string") {
    return error;
  }

  if (error && typeof error === "object" && "message" in error && typeof error.message === "string") {
    return error.message.trim();
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";

function normalizeInput(error: UserFacingError): UserFacingErrorInput {
  return {
    code: error.code,
    title: normalizeOptionalText(error.title) ?? DEFAULT_ERROR_TITLE,
    message: normalizeOptionalText(error.message) ?? DEFAULT_ERROR_MESSAGE,
    hint: normalizeOptionalText(error.hint),
    cause: error.cause,
  };
}

function normalizeOptionalText(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveCauseMessage(cause: unknown, message: string): string | undefined {
  if (cause === undefined || cause === null) {
    return undefined;
  }

  // Wrapped engine errors repeat their own message; surface the next link instead.
  const source = cause instanceof Error && cause.message === message && cause.cause ? cause.cause : cause;
  const resolved = normalizeOptionalText(formatErrorMessage(source));
  if (!resolved || resolved === message) {
    return undefined;
  }

  return resolved;
}
