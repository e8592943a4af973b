/**
 * @cardflow/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { OperatorRole } from "@cardflow/types";
import { isOperatorRole } from "@cardflow/types";

// =============================================================================
// Schema
// =============================================================================

const UTC_OFFSET = /^[+-]\d{2}:\d{2}$/;

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Storage
  DATA_FILE: z.string().min(1).optional(),

  // Calendar
  REFERENCE_UTC_OFFSET: z
    .string()
    .regex(UTC_OFFSET, "Expected a UTC offset such as +03:00")
    .default("+03:00"),

  // Listings
  PAGE_SIZE: z.coerce.number().int().min(1).max(500).default(50),

  // Display labels
  PRIMARY_CURRENCY: z.string().min(1).default("RUB"),
  SECONDARY_CURRENCY: z.string().min(1).default("USD"),

  // Provisioning (CLI only)
  ADMIN_NAME: z.string().min(1).optional(),
  ADMIN_API_KEY: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: OperatorRole;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1,key2:role2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, role] = parts;
    if (parts.length !== 2 || key === undefined || role === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isOperatorRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }

    keys.push({ key, role });
  }

  return keys;
}

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
