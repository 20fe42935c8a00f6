import type { ApiDescription, ApiParameter, ParameterKind } from "../src/core/model.js";

function param(name: string, defaultValue: string | null = null, kind: ParameterKind = "positional_or_keyword"): ApiParameter {
  return { name, kind, defaultValue };
}

/**
 * Small described package used across the suites.
 */
export const SAMPLE_API: ApiDescription = {
  package: "pkg",
  version: "1.0.0",
  elements: [
    { qname: "pkg", kind: "module", parameters: [] },
    { qname: "pkg.fn", kind: "function", parameters: [param("a"), param("x", "None"), param("y", "5")] },
    {
      qname: "pkg.draw.plot",
      kind: "function",
      parameters: [
        param("series", null, "var_positional"),
        param("color", "'k'", "keyword_only"),
        param("style", null, "var_keyword"),
      ],
    },
    { qname: "pkg.io.read", kind: "function", parameters: [param("path"), param("mode", "'r'")] },
    { qname: "pkg.io.write", kind: "function", parameters: [param("path"), param("data")] },
    { qname: "pkg.utils.helpers.read", kind: "function", parameters: [param("source")] },
    { qname: "pkg.models.Model", kind: "class", parameters: [] },
    {
      qname: "pkg.models.Model.__init__",
      kind: "method",
      receiver: "instance",
      parameters: [param("name"), param("layers", "3")],
    },
    {
      qname: "pkg.models.Model.fit",
      kind: "method",
      receiver: "instance",
      parameters: [param("data"), param("epochs", "10")],
    },
    { qname: "pkg.models.Model.__call__", kind: "method", receiver: "instance", parameters: [param("x")] },
    { qname: "pkg.models.Model.load", kind: "method", receiver: "class", parameters: [param("path")] },
    { qname: "pkg.models.Model.describe", kind: "method", receiver: "none", parameters: [param("verbose", "False")] },
    { qname: "pkg.models.Empty", kind: "class", parameters: [] },
  ],
  aliases: {
    "pkg.Model": "pkg.models.Model",
    "pkg.load": "pkg.io.read",
  },
};
