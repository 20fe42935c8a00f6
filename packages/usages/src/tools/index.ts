import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { registerCheckpointStatus } from "./checkpointStatus.js";
import { registerFindUsages } from "./findUsages.js";
import { registerSuggestImprovements } from "./suggestImprovements.js";
import type { Services } from "./types.js";

export type { Services } from "./types.js";

export function registerAllTools(server: McpServer, services: Services): void {
  registerFindUsages(server, services);
  registerSuggestImprovements(server, services);
  registerCheckpointStatus(server, services);
}
