/**
 * Deploy Orchestrator — Public API
 */

export * from "./errors.js";
export * from "./orchestration/index.js";
export * from "./providers/index.js";
export * from "./state/index.js";
export {
  createLogger,
  createSilentLogger,
  StructuredLogger,
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
} from "./logging/logger.js";
export type { Logger, LogLevel, LogEntry, LogTransport, LoggingOptions } from "./logging/logger.js";
export { loadConfig, validateConfig, getDefaultConfig, orchestrateConfigSchema } from "./config/config.js";
export type { OrchestrateConfig, LoadConfigOptions } from "./config/config.js";
export {
  parseTargetFile,
  loadTargetFile,
  resolveTargetPath,
  findTargetFile,
  normalizeAction,
  parseAssignments,
} from "./target/target-file.js";
export type { TargetDefinition, TargetLoadOptions, TargetFile } from "./target/target-file.js";
export { getBlueprint, listBlueprints, instantiateBlueprint, renderBlueprint } from "./blueprints/blueprints.js";
export type { Blueprint, BlueprintParameter } from "./blueprints/blueprints.js";
export { buildProgram } from "./cli/program.js";
export { VERSION } from "./version.js";
