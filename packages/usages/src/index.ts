// Core types and utilities
export * from "./core/model.js";
export * from "./core/errors.js";
export * from "./core/signatures.js";
export * from "./core/binder.js";
export * from "./core/aggregate.js";
export * from "./core/config.js";
export type { CallSiteExtractor } from "./core/ports/CallSiteExtractor.js";
export type { CheckpointStore } from "./core/ports/CheckpointStore.js";
export type { CorpusWalker } from "./core/ports/CorpusWalker.js";
export type { FileSystem } from "./core/ports/FileSystem.js";

// Services
export { ApiIndex, bareName, parentOf } from "./core/services/ApiIndex.js";
export { UsageAnalyzer, aggregateCalls } from "./core/services/UsageAnalyzer.js";
export {
  UsageService,
  type UsageRunRequest,
  type UsageRunResult,
  type UsageServiceDeps,
  fingerprintOf,
  formatSummary,
  toReport,
} from "./core/services/UsageService.js";
export * from "./core/services/improve.js";

// Infrastructure implementations
export { loadApiDescription, parseApiDescription } from "./infrastructure/api/ApiDescriptionLoader.js";
export { FileCheckpointStore, checkpointFileName } from "./infrastructure/checkpoint/FileCheckpointStore.js";
export { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
export { CallResolver, NodeBudgetExceeded } from "./infrastructure/parsers/CallResolver.js";
export { PythonCallExtractor } from "./infrastructure/parsers/PythonCallExtractor.js";
export { TreeSitterParser } from "./infrastructure/parsers/TreeSitterParser.js";
export { readUsageReport } from "./infrastructure/report/UsageReportFile.js";
export { GlobCorpusWalker, readExclusionFile } from "./infrastructure/scanner/GlobCorpusWalker.js";

// Wiring and tools
export { createServices, createUsageService } from "./services.js";
export { registerAllTools, type Services } from "./tools/index.js";
