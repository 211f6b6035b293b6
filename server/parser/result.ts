import type { RecipeWarning, StructureErrorCode } from "./errors";

import { ZodError } from "zod";

import { RecipeWarningsError, StructureError } from "./errors";

export type ParseErrorCode = StructureErrorCode | "WARNINGS" | "INVALID_OPTIONS";

export type ParseResult<T> =
  | { success: true; data: T; warnings: RecipeWarning[] }
  | { success: false; error: string; code: ParseErrorCode; warnings: RecipeWarning[] };

export function parseSuccess<T>(data: T, warnings: RecipeWarning[]): ParseResult<T> {
  return { success: true, data, warnings };
}

export function parseError<T>(
  error: string,
  code: ParseErrorCode,
  warnings: RecipeWarning[] = []
): ParseResult<T> {
  return { success: false, error, code, warnings };
}

/**
 * Map a thrown parse failure to a result. Returns null for errors that are not
 * parse failures, which callers rethrow.
 */
export function mapErrorToResult<T>(error: unknown): ParseResult<T> | null {
  if (error instanceof StructureError) {
    return parseError(error.message, error.code);
  }

  if (error instanceof RecipeWarningsError) {
    return parseError(error.message, "WARNINGS", error.warnings);
  }

  if (error instanceof ZodError) {
    return parseError(error.issues.map((issue) => issue.message).join("; "), "INVALID_OPTIONS");
  }

  return null;
}
