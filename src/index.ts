/**
 * projconfig
 *
 * Reconciles a project's stored configuration with the YAML documents that
 * declare it, firing add, update and remove events for every change.
 *
 * @module
 */

export * from "./core/index.js";
export {
  createLogger,
  type Logger,
  type LogLevel,
  EventBus,
  type EventHandler,
  EngineSettingsSchema,
  SettingsFileSchema,
  ImportPolicySchema,
  parseEngineSettings,
  THIRTY_DAYS_MS,
  type EngineSettings,
  type EngineSettingsInput,
  type ImportPolicy,
  type SettingsFile,
} from "./utils/index.js";
