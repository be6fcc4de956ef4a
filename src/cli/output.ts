import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  toUserFacingError,
  type ErrorFormatLine,
} from "../core/error-format.js";
import { InvalidQueryError, type UserFacingErrorCode } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliOutputOptions = {
  useJson: boolean;
  prettyJson: boolean;
  debug: boolean;
};

export type CliJsonError = {
  code: UserFacingErrorCode;
  message: string;
  details: Record<string, unknown> | null;
};

export type CliJsonEnvelope<T> = { ok: true; result: T } | { ok: false; error: CliJsonError };

// =============================================================================
// RESULTS
// =============================================================================

export function emitResult<T>(result: T, output: CliOutputOptions, renderText: (result: T) => string[]): void {
  if (output.useJson) {
    printJson({ ok: true, result }, output);
    return;
  }

  for (const line of renderText(result)) {
    console.log(line);
  }
}

// =============================================================================
// ERRORS
// =============================================================================

export function emitError(error: unknown, output: CliOutputOptions): void {
  process.exitCode = 1;

  if (output.useJson) {
    printJson({ ok: false, error: toJsonError(error) }, output);
    return;
  }

  const format = createAnsiFormatter(resolveColorEnabled({ stream: process.stderr }));
  for (const line of formatErrorLines(error, { mode: output.debug ? "debug" : "short" })) {
    console.error(styleLine(line, format));
  }
}

export function toJsonError(error: unknown): CliJsonError {
  const userError = toUserFacingError(error);
  const queryError = findInvalidQueryError(error);

  return {
    code: userError.code,
    message: userError.message,
    details: queryError ? { ...queryError.details } : null,
  };
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function printJson<T>(envelope: CliJsonEnvelope<T>, output: CliOutputOptions): void {
  console.log(output.prettyJson ? JSON.stringify(envelope, null, 2) : JSON.stringify(envelope));
}

function findInvalidQueryError(error: unknown): InvalidQueryError | null {
  if (error instanceof InvalidQueryError) return error;
  if (error instanceof Error && error.cause instanceof InvalidQueryError) return error.cause;
  return null;
}

function styleLine(line: ErrorFormatLine, format: ReturnType<typeof createAnsiFormatter>): string {
  switch (line.kind) {
    case "title":
      return format(line.text, ["bold", "red"]);
    case "hint":
      return format(`hint: ${line.text}`, ["yellow"]);
    case "stack":
      return format(line.text, ["dim"]);
    case "code":
    case "name":
    case "cause":
      return format(`${line.kind}: ${line.text}`, ["dim"]);
    default:
      return line.text;
  }
}
