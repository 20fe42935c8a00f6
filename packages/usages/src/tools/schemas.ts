import * as z from "zod/v4";

export const RunSummarySchema = {
  filesTotal: z.number(),
  processed: z.number(),
  skipped: z.number(),
  irrelevant: z.number(),
  failed: z.number(),
  parseFailures: z.number(),
  readFailures: z.number(),
  checkpointFailures: z.number(),
  resolvedCalls: z.number(),
  unresolvedCalls: z.number(),
};

export const FileFailureSchema = z.object({
  file: z.string(),
  kind: z.enum(["read", "parse", "checkpoint"]),
  message: z.string(),
  location: z.object({ line: z.number(), column: z.number() }).optional(),
});

export const ElementUsageSchema = z.object({
  qname: z.string(),
  calls: z.number(),
});

export const RareValueSchema = z.object({
  qname: z.string(),
  parameter: z.string(),
  value: z.string(),
  count: z.number(),
});

export const FixableParameterSchema = z.object({
  qname: z.string(),
  parameter: z.string(),
  suggestedValue: z.string(),
  customisations: z.number(),
});
