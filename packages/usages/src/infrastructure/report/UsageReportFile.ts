import { readFile } from "node:fs/promises";

import { Err, Ok, type Result, toError } from "@usagelens/core";
import * as z from "zod/v4";

import { ConfigError } from "../../core/errors.js";
import type { UsageReport } from "../../core/model.js";

const count = z.number().int().nonnegative();

export const UsageReportSchema = z.object({
  package: z.string(),
  version: z.string().optional(),
  calls: z.record(z.string(), count),
  files: z.record(z.string(), count).default({}),
  parameters: z.record(z.string(), z.record(z.string(), z.record(z.string(), count))),
  unresolvedCalls: count.default(0),
});

/**
 * Read a usage report written by a previous run.
 */
export async function readUsageReport(file: string): Promise<Result<UsageReport, ConfigError>> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(file, "utf-8"));
  } catch (error) {
    return Err(new ConfigError(`Cannot read usage report ${file}: ${toError(error).message}`));
  }

  const parsed = UsageReportSchema.safeParse(json);
  if (!parsed.success) {
    return Err(new ConfigError(`Invalid usage report ${file}: ${z.prettifyError(parsed.error)}`));
  }
  return Ok(parsed.data);
}
