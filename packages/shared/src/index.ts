/**
 * @civitas/shared
 * Shared schemas, constants and logging for Civitas
 */

// Export schemas (includes type definitions)
export * from "./schemas/index.js";

// Export constants
export * from "./constants/index.js";

// Export logger
export {
  logger,
  createServiceLogger,
  governanceLogger,
  registryLogger,
  logGovernanceAction,
  logError,
  createTimer,
  type GovernanceActionLogContext,
} from "./logger/index.js";
