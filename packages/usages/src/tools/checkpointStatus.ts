/**
 * checkpoint_status - Summarise what a checkpoint directory already holds.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { Ok, resultToStructuredResponse } from "@usagelens/core";
import * as z from "zod/v4";

import { addAggregate, emptyAggregate, totalResolvedCalls } from "../core/aggregate.js";
import type { Services, ToolFailure, ToolResponse } from "./types.js";

interface CheckpointStatusInput {
  tmp_dir?: string;
}

interface CheckpointStatusOutput extends Record<string, unknown> {
  directory: string;
  files: number;
  elements: number;
  resolvedCalls: number;
  unresolvedCalls: number;
}

export function registerCheckpointStatus(server: McpServer, services: Services): void {
  server.registerTool(
    "checkpoint_status",
    {
      title: "Checkpoint status",
      description: `Report how many files a checkpoint directory has recorded and their merged totals.
Useful to check progress of an interrupted find_usages run before resuming it.`,
      inputSchema: {
        tmp_dir: z.string().optional().describe("Checkpoint directory (defaults to the server's)"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        directory: z.string().optional(),
        files: z.number().optional(),
        elements: z.number().optional(),
        resolvedCalls: z.number().optional(),
        unresolvedCalls: z.number().optional(),
      },
    },
    async (
      input: CheckpointStatusInput
    ): Promise<ToolResponse<(CheckpointStatusOutput & { success: true }) | ToolFailure>> => {
      const directory = input.tmp_dir ?? services.defaultTmpDir;
      const merged = emptyAggregate();
      let files = 0;
      for await (const record of services.openStore(directory).loadAll()) {
        addAggregate(merged, record.aggregate);
        files++;
      }

      const status: CheckpointStatusOutput = {
        directory,
        files,
        elements: Object.keys(merged.callCounts).length,
        resolvedCalls: totalResolvedCalls(merged),
        unresolvedCalls: merged.unresolvedCalls,
      };

      return resultToStructuredResponse(Ok(status), (value) => ({
        text: [
          `Checkpoints in ${value.directory}: ${value.files} files`,
          `${value.elements} API elements called, ${value.resolvedCalls} resolved and ${value.unresolvedCalls} unresolved calls`,
        ].join("\n"),
        data: value,
      }));
    }
  );
}
