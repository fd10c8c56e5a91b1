/**
 * @closegate/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v.trim()));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Notifications
  APP_NAME: z.string().min(1).default("Close Gate"),
  MAIL_FROM: z.string().email().default("closegate-noreply@example.com"),
  MAIL_RELAY_URL: optionalString.pipe(z.string().url().optional()),
  MAIL_RELAY_API_KEY: optionalString,
  NOTIFY_ATTEMPT_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),

  // Evaluation
  EVALUATION_TIMEOUT_MS: z.coerce.number().int().min(100).default(30_000),

  // Storage
  AUDIT_LOG_PATH: optionalString,
  CUBE_SNAPSHOT_PATH: optionalString,
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
