import { z } from "zod";

import { getEnv } from "./env";

export const ParseModeSchema = z.enum(["strict", "permissive"]);

export type ParseMode = z.infer<typeof ParseModeSchema>;

export const ParseOptionsSchema = z
  .object({
    /**
     * strict: a document without a thematic break is rejected.
     * permissive: it is read as metadata only, with a warning.
     */
    mode: ParseModeSchema.optional(),
    /** Reject the parse when any warning was recorded */
    failOnWarnings: z.boolean().default(false),
  })
  .strict();

export type ParseOptionsInput = z.input<typeof ParseOptionsSchema>;

export interface ParseOptions {
  mode: ParseMode;
  failOnWarnings: boolean;
}

/**
 * Validate caller options and fill in defaults; the mode falls back to
 * RECIPE_PARSE_MODE.
 */
export function resolveParseOptions(input: ParseOptionsInput = {}): ParseOptions {
  const parsed = ParseOptionsSchema.parse(input);

  return {
    mode: parsed.mode ?? getEnv().RECIPE_PARSE_MODE,
    failOnWarnings: parsed.failOnWarnings,
  };
}

export const RenderHtmlOptionsSchema = z
  .object({
    /** Add schema.org Recipe microdata attributes */
    schemaOrg: z.boolean().default(false),
  })
  .strict();

export type RenderHtmlOptionsInput = z.input<typeof RenderHtmlOptionsSchema>;
export type RenderHtmlOptions = z.output<typeof RenderHtmlOptionsSchema>;

export const ScaleOptionsSchema = z
  .object({
    mode: z.enum(["decimal", "fraction"]).default("fraction"),
  })
  .strict();

export type ScaleOptionsInput = z.input<typeof ScaleOptionsSchema>;
