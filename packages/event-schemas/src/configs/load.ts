/**
 * Environment loader for topic/type config blocks.
 *
 * Each declared field is read from the environment variable of the same
 * name, matched case-insensitively and optionally prefixed, so
 * `notification_event_topic` with prefix "fns_" is read from
 * FNS_NOTIFICATION_EVENT_TOPIC. Services combine several blocks with zod's
 * .merge() and load them in one call.
 */

import type { z } from "zod";
import { ConfigError } from "../errors.js";

/** Any object-shaped config block */
export type ConfigSchema<TOutput> = z.ZodObject<
  z.ZodRawShape,
  z.UnknownKeysParam,
  z.ZodTypeAny,
  TOutput,
  unknown
>;

export interface LoadEventsConfigOptions {
  /** Environment to read from (default: process.env) */
  env?: Readonly<Record<string, string | undefined>>;
  /** Prepended to every field name before the lookup */
  prefix?: string;
  /** Explicit values; these win over the environment */
  overrides?: Readonly<Record<string, unknown>>;
}

/**
 * Load and validate a config block from the environment.
 *
 * @throws ConfigError (CONFIG_INVALID) listing every missing or invalid field
 */
export function loadEventsConfig<TOutput>(
  schema: ConfigSchema<TOutput>,
  options: LoadEventsConfigOptions = {},
): TOutput {
  const { env = process.env, prefix = "", overrides = {} } = options;

  const envByName = new Map<string, string>();
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined) envByName.set(name.toUpperCase(), value);
  }

  const raw: Record<string, unknown> = {};
  for (const field of Object.keys(schema.shape)) {
    const value = envByName.get(envVarName(prefix, field));
    if (value !== undefined) raw[field] = value;
  }
  Object.assign(raw, overrides);

  const result = schema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const missing = result.error.issues
    .filter((issue) => issue.path.length === 1 && raw[String(issue.path[0])] === undefined)
    .map((issue) => envVarName(prefix, String(issue.path[0])));

  throw new ConfigError(
    `Invalid events config: ${result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ")}`,
    "CONFIG_INVALID",
    { missing, issues: result.error.issues },
  );
}

/** Environment variable consulted for a config field */
export function envVarName(prefix: string, field: string): string {
  return `${prefix}${field}`.toUpperCase();
}
