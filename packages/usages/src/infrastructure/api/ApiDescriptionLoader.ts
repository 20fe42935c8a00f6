/**
 * Loads the API description produced by the public-API collaborator.
 *
 * Two JSON layouts are accepted:
 * - native: `{ package, version?, elements: [...], aliases? }`
 * - legacy: `{ distribution, package, version, classes: [...], functions: [...] }`
 */

import { readFile } from "node:fs/promises";

import { Err, Ok, type Result, toError } from "@usagelens/core";
import * as z from "zod/v4";

import { ConfigError } from "../../core/errors.js";
import type { ApiDescription, ApiElement, ApiParameter, ReceiverKind } from "../../core/model.js";
import { parentOf } from "../../core/services/ApiIndex.js";

const ParameterKindSchema = z.enum([
  "positional_only",
  "positional_or_keyword",
  "var_positional",
  "keyword_only",
  "var_keyword",
]);

const NativeSchema = z.object({
  package: z.string().min(1),
  version: z.string().optional(),
  elements: z.array(
    z.object({
      qname: z.string().min(1),
      kind: z.enum(["module", "class", "function", "method", "parameter"]),
      parameters: z
        .array(
          z.object({
            name: z.string().min(1),
            kind: ParameterKindSchema.default("positional_or_keyword"),
            default: z.string().nullable().optional(),
          })
        )
        .default([]),
      receiver: z.enum(["instance", "class", "none"]).optional(),
    })
  ),
  aliases: z.record(z.string(), z.string()).default({}),
});

const LegacySchema = z.object({
  distribution: z.string().optional(),
  package: z.string().min(1),
  version: z.string().optional(),
  classes: z.array(z.string()),
  functions: z.array(
    z.object({
      qname: z.string().min(1),
      parameters: z.array(
        z.object({
          name: z.string().min(1),
          default_value: z.string().nullable(),
        })
      ),
    })
  ),
});

/**
 * Validate a parsed JSON document as an API description.
 */
export function parseApiDescription(json: unknown): Result<ApiDescription, ConfigError> {
  const native = NativeSchema.safeParse(json);
  if (native.success) {
    const { data } = native;
    return Ok({
      package: data.package,
      version: data.version,
      aliases: data.aliases,
      elements: data.elements.map((element) => ({
        qname: element.qname,
        kind: element.kind,
        receiver: element.kind === "method" ? (element.receiver ?? "instance") : element.receiver,
        parameters: element.parameters.map((p) => ({
          name: p.name,
          kind: p.kind,
          defaultValue: p.default ?? null,
        })),
      })),
    });
  }

  const legacy = LegacySchema.safeParse(json);
  if (legacy.success) {
    return Ok(fromLegacy(legacy.data));
  }

  return Err(new ConfigError(`Invalid API description: ${z.prettifyError(native.error)}`));
}

export async function loadApiDescription(file: string): Promise<Result<ApiDescription, ConfigError>> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(file, "utf-8"));
  } catch (error) {
    return Err(new ConfigError(`Cannot read API description ${file}: ${toError(error).message}`));
  }
  return parseApiDescription(json);
}

/**
 * Legacy records list methods as functions under a class path, with the
 * receiver still in the parameter list.
 */
function fromLegacy(data: z.infer<typeof LegacySchema>): ApiDescription {
  const classes = new Set(data.classes);
  const elements: ApiElement[] = data.classes.map((qname) => ({ qname, kind: "class", parameters: [] }));

  for (const fn of data.functions) {
    const parameters: ApiParameter[] = fn.parameters.map((p) => ({
      name: p.name,
      kind: "positional_or_keyword",
      defaultValue: p.default_value,
    }));

    if (!classes.has(parentOf(fn.qname))) {
      elements.push({ qname: fn.qname, kind: "function", parameters });
      continue;
    }

    let receiver: ReceiverKind = "none";
    const first = parameters[0];
    if (first?.name === "self") receiver = "instance";
    else if (first?.name === "cls") receiver = "class";

    elements.push({
      qname: fn.qname,
      kind: "method",
      receiver,
      parameters: receiver === "none" ? parameters : parameters.slice(1),
    });
  }

  return { package: data.package, version: data.version, elements, aliases: {} };
}
