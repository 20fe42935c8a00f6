import * as z from "zod/v4";

/**
 * Options for one usage run.
 */
export const UsageRunOptionsSchema = z.object({
  srcDir: z.string().min(1).describe("Corpus root directory"),
  apiFile: z.string().min(1).optional().describe("API description JSON"),
  tmpDir: z.string().min(1).describe("Checkpoint directory, reused when resuming"),
  excludeFile: z.string().min(1).optional().describe("Newline-separated paths or globs to skip"),
  exclude: z.array(z.string()).default([]),
  outFile: z.string().min(1).optional().describe("Where to write the usage report"),
  concurrency: z.number().int().min(1).max(64).default(4),
  maxFileBytes: z.number().int().positive().default(1024 * 1024),
  maxNodes: z.number().int().positive().default(500_000),
  checkpointRetries: z.number().int().min(1).max(10).default(3),
  skipIrrelevantFiles: z.boolean().default(true),
});

export type UsageRunInput = z.input<typeof UsageRunOptionsSchema>;
export type UsageRunOptions = z.output<typeof UsageRunOptionsSchema>;
