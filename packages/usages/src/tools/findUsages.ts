/**
 * find_usages - Count API calls and argument values across a corpus.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { resultToStructuredResponse } from "@usagelens/core";
import * as z from "zod/v4";

import type { FileFailure, RunSummary } from "../core/model.js";
import { formatSummary } from "../core/services/UsageService.js";
import { FileFailureSchema, RunSummarySchema } from "./schemas.js";
import type { Services, ToolFailure, ToolResponse } from "./types.js";

interface FindUsagesInput {
  src_dir: string;
  api_file: string;
  tmp_dir?: string;
  out_file?: string;
  exclude_file?: string;
  exclude?: string[];
  concurrency?: number;
  skip_irrelevant_files?: boolean;
}

interface FindUsagesOutput extends Record<string, unknown> {
  summary: Omit<RunSummary, "failures">;
  failures: FileFailure[];
  outFile?: string;
}

const MAX_LISTED_FAILURES = 20;

export function registerFindUsages(server: McpServer, services: Services): void {
  server.registerTool(
    "find_usages",
    {
      title: "Find API usages",
      description: `Analyse a Python corpus and count how client code calls a library.

For every function, method and constructor in the API description:
- number of resolved call sites and of files calling it
- per parameter, a histogram of passed values (literals, shapes, <default>, <unknown>)

Resumable: files already checkpointed in tmp_dir with unchanged content are skipped.
Calls that cannot be resolved statically are counted but not attributed.`,
      inputSchema: {
        src_dir: z.string().describe("Corpus root directory"),
        api_file: z.string().describe("API description JSON"),
        tmp_dir: z.string().optional().describe("Checkpoint directory (defaults to the server's)"),
        out_file: z.string().optional().describe("Write the usage report JSON here"),
        exclude_file: z.string().optional().describe("Newline-separated paths or globs to skip"),
        exclude: z.array(z.string()).optional().describe("Paths or globs to skip"),
        concurrency: z.number().int().min(1).max(64).optional(),
        skip_irrelevant_files: z.boolean().optional(),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        summary: z.object(RunSummarySchema).optional(),
        failures: z.array(FileFailureSchema).optional(),
        outFile: z.string().optional(),
      },
    },
    async (input: FindUsagesInput): Promise<ToolResponse<(FindUsagesOutput & { success: true }) | ToolFailure>> => {
      const result = await services.usages.run({
        srcDir: input.src_dir,
        apiFile: input.api_file,
        tmpDir: input.tmp_dir ?? services.defaultTmpDir,
        outFile: input.out_file,
        excludeFile: input.exclude_file,
        exclude: input.exclude,
        concurrency: input.concurrency,
        skipIrrelevantFiles: input.skip_irrelevant_files,
      });

      return resultToStructuredResponse(result, ({ summary, outFile }) => {
        const { failures, ...counts } = summary;
        const lines = [formatSummary(summary)];

        if (failures.length > 0) {
          lines.push("", "Failed files:");
          for (const failure of failures.slice(0, MAX_LISTED_FAILURES)) {
            lines.push(`- ${failure.file} (${failure.kind}): ${failure.message}`);
          }
          if (failures.length > MAX_LISTED_FAILURES) {
            lines.push(`... and ${failures.length - MAX_LISTED_FAILURES} more`);
          }
        }
        if (outFile) {
          lines.push("", `Report written to ${outFile}`);
        }

        return { text: lines.join("\n"), data: { summary: counts, failures, outFile } };
      });
    }
  );
}
