// Node adapters
export {
  NodeFileHandle,
  NodeFileSystem,
} from "./adapters/node/node-filesystem.js";
// Catalogs
export { REQUEST_CATALOG } from "./catalog/requests.js";
export { RESPONSE_CATALOG } from "./catalog/responses.js";
export type { Catalog, FixtureEntry } from "./catalog/types.js";
export { defineCatalog } from "./catalog/types.js";
// CLI
export type { RunOptions } from "./cli/run.js";
export { runGenerators } from "./cli/run.js";
// Config
export type {
  FixtureKind,
  GeneratorConfig,
} from "./config/generator-config.js";
export {
  requestGeneratorConfig,
  responseGeneratorConfig,
} from "./config/generator-config.js";
// Generator
export type {
  FixtureGeneratorOptions,
  GenerationReport,
} from "./generator/fixture-generator.js";
export { FixtureGenerator } from "./generator/fixture-generator.js";
// Interfaces
export type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
// Logging
export type { LogEntry, Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  LogStore,
  storeLogger,
} from "./logging/logger.js";
// Presets
export type { NodeGeneratorOptions } from "./presets/node.js";
export { createNodeGenerator } from "./presets/node.js";
// Testing
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
// Utils
export { byteRange, concat, decodeToString, fromString } from "./utils/buffer.js";
