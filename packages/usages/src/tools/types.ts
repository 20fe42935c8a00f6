import type { Result } from "@usagelens/core";

import type { ConfigError } from "../core/errors.js";
import type { ApiDescription, UsageReport } from "../core/model.js";
import type { CheckpointStore } from "../core/ports/CheckpointStore.js";
import type { UsageService } from "../core/services/UsageService.js";

export type { ToolResponse, ToolFailure } from "@usagelens/core";

export interface Services {
  usages: UsageService;
  loadApi: (file: string) => Promise<Result<ApiDescription, ConfigError>>;
  readReport: (file: string) => Promise<Result<UsageReport, ConfigError>>;
  openStore: (directory: string) => CheckpointStore;
  /** Checkpoint directory used when a tool call names none */
  defaultTmpDir: string;
}
