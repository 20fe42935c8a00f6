/**
 * suggest_improvements - Apply the minimum-usage filter to a usage report.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { Ok, errorResponse, resultToStructuredResponse } from "@usagelens/core";
import * as z from "zod/v4";

import { ApiIndex } from "../core/services/ApiIndex.js";
import { type ImprovementReport, suggestImprovements } from "../core/services/improve.js";
import { ElementUsageSchema, FixableParameterSchema, RareValueSchema } from "./schemas.js";
import type { Services, ToolFailure, ToolResponse } from "./types.js";

interface SuggestImprovementsInput {
  api_file: string;
  usages_file: string;
  min_usages?: number;
}

type SuggestImprovementsOutput = ImprovementReport & Record<string, unknown>;

export function registerSuggestImprovements(server: McpServer, services: Services): void {
  server.registerTool(
    "suggest_improvements",
    {
      title: "Suggest API improvements",
      description: `Flag rarely used API elements and parameter values.

Anything used strictly fewer than min_usages times is reported:
- unusedElements / unusedClasses: candidates for removal
- rareValues: parameter values almost nobody passes
- fixableParameters: parameters that could become a constant`,
      inputSchema: {
        api_file: z.string().describe("API description JSON"),
        usages_file: z.string().describe("Usage report written by find_usages"),
        min_usages: z.number().int().min(0).optional().describe("Threshold, default 1"),
      },
      outputSchema: {
        success: z.boolean(),
        error: z.string().optional(),
        minUsages: z.number().optional(),
        unusedElements: z.array(ElementUsageSchema).optional(),
        unusedClasses: z.array(ElementUsageSchema).optional(),
        rareValues: z.array(RareValueSchema).optional(),
        fixableParameters: z.array(FixableParameterSchema).optional(),
        internalUsages: z.array(z.string()).optional(),
      },
    },
    async (
      input: SuggestImprovementsInput
    ): Promise<ToolResponse<(SuggestImprovementsOutput & { success: true }) | ToolFailure>> => {
      const api = await services.loadApi(input.api_file);
      if (!api.ok) {
        return errorResponse(api.error);
      }
      const report = await services.readReport(input.usages_file);
      if (!report.ok) {
        return errorResponse(report.error);
      }

      const improvements = suggestImprovements(report.value, new ApiIndex(api.value), input.min_usages ?? 1);

      return resultToStructuredResponse(Ok(improvements), (value) => ({
        text: formatImprovements(value),
        data: { ...value },
      }));
    }
  );
}

function formatImprovements(report: ImprovementReport): string {
  const lines = [`# Improvements (min usages: ${report.minUsages})`, ""];

  lines.push(`Unused elements: ${report.unusedElements.length}`);
  for (const element of report.unusedElements) {
    lines.push(`- ${element.qname} (${element.calls})`);
  }
  lines.push("", `Unused classes: ${report.unusedClasses.length}`);
  for (const cls of report.unusedClasses) {
    lines.push(`- ${cls.qname} (${cls.calls})`);
  }
  lines.push("", `Rare values: ${report.rareValues.length}`);
  lines.push("", `Parameters that could be constants: ${report.fixableParameters.length}`);
  for (const p of report.fixableParameters) {
    lines.push(`- ${p.qname}(${p.parameter}) = ${p.suggestedValue} (${p.customisations} customised)`);
  }
  if (report.internalUsages.length > 0) {
    lines.push("", `Ignored entries outside the API: ${report.internalUsages.length}`);
  }
  return lines.join("\n");
}
