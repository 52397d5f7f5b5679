import { z } from "zod";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const environment_schema = z.object({
  LINEAR_HASH_LOG_LEVEL: z.enum(LOG_LEVELS).default("silent"),
});

export type Environment = z.infer<typeof environment_schema>;

/**
 * Parse the variables the library reads from `source`. Empty strings count
 * as unset so `LINEAR_HASH_LOG_LEVEL=` falls back to the default.
 */
export function parse_environment(
  source: Record<string, string | undefined>,
): Environment {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(environment_schema.shape)) {
    const value = source[key];
    if (value !== undefined && value !== "") picked[key] = value.trim();
  }

  const parsed = environment_schema.safeParse(picked);
  if (!parsed.success) {
    throw new Error(
      `Missing or invalid environment variables: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
    );
  }
  return parsed.data;
}

let cached: Environment | null = null;

/** Validated view of process.env, parsed on first use. */
export function environment(): Environment {
  if (cached === null) cached = parse_environment(process.env);
  return cached;
}
