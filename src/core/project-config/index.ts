/**
 * Project Config
 *
 * Public API of the reconciliation engine.
 *
 * @module
 */

export type {
  IProjectConfig,
  ApplyOptions,
  ApplyResult,
  FlushResult,
  ProjectConfigDependencies,
} from "./interfaces/IProjectConfig.js";

export {
  ProjectConfigService,
  createProjectConfig,
  resolveSettings,
  MODIFIED_TIMES_FILE,
  type ResolvedSettings,
} from "./impl/ProjectConfigService.js";
