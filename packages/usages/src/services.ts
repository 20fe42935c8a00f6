import { type Logger, createLogger } from "@usagelens/core";

import { UsageService } from "./core/services/UsageService.js";
import { loadApiDescription } from "./infrastructure/api/ApiDescriptionLoader.js";
import { FileCheckpointStore } from "./infrastructure/checkpoint/FileCheckpointStore.js";
import { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
import { PythonCallExtractor } from "./infrastructure/parsers/PythonCallExtractor.js";
import { TreeSitterParser } from "./infrastructure/parsers/TreeSitterParser.js";
import { readUsageReport } from "./infrastructure/report/UsageReportFile.js";
import { GlobCorpusWalker, readExclusionFile } from "./infrastructure/scanner/GlobCorpusWalker.js";
import type { Services } from "./tools/types.js";

/**
 * Wire the Node.js adapters into a UsageService.
 */
export function createUsageService(logger: Logger = createLogger("usages")): UsageService {
  const parser = new TreeSitterParser();

  return new UsageService({
    walker: new GlobCorpusWalker([".py"]),
    fs: new NodeFileSystem(),
    loadApi: loadApiDescription,
    readExclusions: readExclusionFile,
    openStore: (directory, retries) => new FileCheckpointStore(directory, { retries, logger }),
    createExtractor: (api, maxNodes) => new PythonCallExtractor(api, { maxNodes }, parser),
    logger,
  });
}

export function createServices(defaultTmpDir: string, logger: Logger = createLogger("usages")): Services {
  return {
    usages: createUsageService(logger),
    loadApi: loadApiDescription,
    readReport: readUsageReport,
    openStore: (directory) => new FileCheckpointStore(directory, { logger }),
    defaultTmpDir,
  };
}
