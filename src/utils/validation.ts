/**
 * Runtime Validation Schemas
 *
 * Zod schemas for engine settings and persisted payloads.
 *
 * @module
 */

import { z } from "zod";
import type { ConfigTree, ConfigValue } from "../types/index.js";
import { ConfigurationError, ErrorCode, PersistenceError } from "../core/errors.js";

// =============================================================================
// Config Values
// =============================================================================

export const ConfigValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ConfigValueSchema),
    z.record(ConfigValueSchema),
  ])
);

export const ConfigTreeSchema: z.ZodType<ConfigTree> = z.record(ConfigValueSchema);

// =============================================================================
// Persisted Payloads
// =============================================================================

/**
 * Top-level node name to owning file
 */
export const ConfigMapSchema = z.record(z.string().min(1));

export type ConfigMapData = z.infer<typeof ConfigMapSchema>;

/**
 * File path to modification time
 */
export const ModifiedTimesSchema = z.record(z.number().nonnegative());

// =============================================================================
// Engine Settings
// =============================================================================

export const THIRTY_DAYS_MS = 30 * 24 * 60 * 60 * 1000;

/**
 * What to do with an import that points outside the root directory
 */
export const ImportPolicySchema = z.enum(["skip", "error"]);

export type ImportPolicy = z.infer<typeof ImportPolicySchema>;

export const EngineSettingsSchema = z.object({
  /** Project root; relative directories below resolve against it */
  rootDir: z.string().min(1),

  /** Directory holding the root document and its imports */
  configDir: z.string().min(1).default("config"),

  /** Root document file name */
  configFilename: z.string().min(1).default("project.yaml"),

  /** Read and write YAML files; when false the stored snapshot is the only source */
  useConfigFile: z.boolean().default(true),

  importPolicy: ImportPolicySchema.default("skip"),

  /** Lifetime of cached file modification times */
  cacheTtlMs: z.number().int().positive().default(THIRTY_DAYS_MS),

  /** Where the JSON record store and caches live */
  dataDir: z.string().min(1).default(".projconfig/data"),
});

export type EngineSettings = z.infer<typeof EngineSettingsSchema>;
export type EngineSettingsInput = z.input<typeof EngineSettingsSchema>;

/**
 * Settings file shape: everything optional, rootDir comes from the caller
 */
export const SettingsFileSchema = EngineSettingsSchema.omit({ rootDir: true }).partial();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

// =============================================================================
// Helpers
// =============================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validates engine settings, applying defaults
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseEngineSettings(input: unknown): EngineSettings {
  const result = EngineSettingsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid engine settings: ${formatIssues(result.error)}`,
      ErrorCode.CONFIG_SETTINGS_INVALID,
      { issues: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Parses a JSON payload from the record store against a schema
 *
 * @throws PersistenceError when the payload is not JSON or does not match
 */
export function parsePayload<T>(schema: z.ZodType<T>, payload: string, target: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (error) {
    throw new PersistenceError(`Stored ${target} is not valid JSON`, ErrorCode.PERSISTENCE_PAYLOAD_INVALID, {
      target,
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new PersistenceError(
      `Stored ${target} has an unexpected shape: ${formatIssues(result.error)}`,
      ErrorCode.PERSISTENCE_PAYLOAD_INVALID,
      { target }
    );
  }
  return result.data;
}
