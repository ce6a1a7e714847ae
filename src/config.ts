/**
 * Resource Viewer Configuration
 *
 * Schema-based validation of cache and logging settings using Zod.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { LOG_LEVELS } from "./logging/logger.js";

export const resourceViewerSettingsSchema = z.object({
  /** Maximum number of cached components. */
  capacity: z.number().int().positive().default(100),
  /** Cached component lifetime in milliseconds; 0 never expires. */
  ttlMs: z.number().int().nonnegative().default(0),
  logLevel: z.enum(LOG_LEVELS).default("info"),
  /** Prefix of object paths produced by the default path resolver. */
  pathPrefix: z.string().default("/overview"),
});

export type ResourceViewerSettings = z.infer<typeof resourceViewerSettingsSchema>;
export type ResourceViewerSettingsInput = z.input<typeof resourceViewerSettingsSchema>;

export const DEFAULT_SETTINGS: ResourceViewerSettings = resourceViewerSettingsSchema.parse({});

export function parseSettings(input: unknown = {}): ResourceViewerSettings {
  const result = resourceViewerSettingsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid resource viewer settings: ${issues}`);
  }
  return result.data;
}

const envSchema = z.object({
  RESOURCE_VIEWER_CACHE_CAPACITY: z.coerce.number().optional(),
  RESOURCE_VIEWER_CACHE_TTL_MS: z.coerce.number().optional(),
  RESOURCE_VIEWER_LOG_LEVEL: z.string().optional(),
  RESOURCE_VIEWER_PATH_PREFIX: z.string().optional(),
});

/**
 * Read overrides from RESOURCE_VIEWER_* environment variables.
 */
export function loadSettingsFromEnv(env: Record<string, string | undefined> = process.env): ResourceViewerSettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid resource viewer environment: ${parsed.error.message}`);
  }
  const vars = parsed.data;
  return parseSettings({
    capacity: vars.RESOURCE_VIEWER_CACHE_CAPACITY,
    ttlMs: vars.RESOURCE_VIEWER_CACHE_TTL_MS,
    logLevel: vars.RESOURCE_VIEWER_LOG_LEVEL,
    pathPrefix: vars.RESOURCE_VIEWER_PATH_PREFIX,
  });
}
