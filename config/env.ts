import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  RECIPE_PARSE_MODE: z.enum(["strict", "permissive"]).default("strict"),
});

export type Env = z.infer<typeof EnvSchema>;

let cached: Env | null = null;

/**
 * Validated process environment. Parsed once, on first use.
 */
export function getEnv(): Env {
  if (!cached) {
    cached = EnvSchema.parse(process.env);
  }

  return cached;
}
