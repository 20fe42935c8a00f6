import { describe, it, expect } from "vitest";

import type { UsageReport } from "../src/core/model.js";
import { ApiIndex } from "../src/core/services/ApiIndex.js";
import { suggestImprovements } from "../src/core/services/improve.js";
import { SAMPLE_API } from "./helpers.js";

const api = new ApiIndex(SAMPLE_API);

const report: UsageReport = {
  package: "pkg",
  calls: {
    "pkg.fn": 5,
    "pkg.io.read": 2,
    "pkg.models.Model.__init__": 1,
    "pkg.models.Model.fit": 1,
    "pkg._internal.setup": 4,
  },
  files: {},
  parameters: {
    "pkg.fn": {
      a: { unknown: 5 },
      x: { "literal:1": 3, "literal:2": 2 },
      y: { default: 4, "literal:7": 1 },
    },
    "pkg.io.read": {
      path: { "literal:'a'": 2 },
      mode: { default: 1, "literal:'rb'": 1 },
    },
  },
  unresolvedCalls: 0,
};

describe("suggestImprovements", () => {
  it("flags elements strictly below the threshold and keeps ties", () => {
    const result = suggestImprovements(report, api, 2);

    expect(result.unusedElements).toEqual([
      { qname: "pkg.draw.plot", calls: 0 },
      { qname: "pkg.io.write", calls: 0 },
      { qname: "pkg.models.Model.__call__", calls: 0 },
      { qname: "pkg.models.Model.__init__", calls: 1 },
      { qname: "pkg.models.Model.describe", calls: 0 },
      { qname: "pkg.models.Model.fit", calls: 1 },
      { qname: "pkg.models.Model.load", calls: 0 },
      { qname: "pkg.utils.helpers.read", calls: 0 },
    ]);
  });

  it("sums class usage over the class's callables", () => {
    expect(suggestImprovements(report, api, 2).unusedClasses).toEqual([{ qname: "pkg.models.Empty", calls: 0 }]);
    expect(suggestImprovements(report, api, 3).unusedClasses).toEqual([
      { qname: "pkg.models.Empty", calls: 0 },
      { qname: "pkg.models.Model", calls: 2 },
    ]);
  });

  it("lists rare values but not omitted or unknown arguments", () => {
    expect(suggestImprovements(report, api, 2).rareValues).toEqual([
      { qname: "pkg.fn", parameter: "y", value: "7", count: 1 },
      { qname: "pkg.io.read", parameter: "mode", value: "'rb'", count: 1 },
    ]);
  });

  it("suggests constants for rarely customised parameters", () => {
    expect(suggestImprovements(report, api, 2).fixableParameters).toEqual([
      { qname: "pkg.fn", parameter: "y", suggestedValue: "<default>", customisations: 1 },
      { qname: "pkg.io.read", parameter: "mode", suggestedValue: "<default>", customisations: 1 },
      { qname: "pkg.io.read", parameter: "path", suggestedValue: "'a'", customisations: 0 },
    ]);
  });

  it("counts an explicitly passed default as using the default", () => {
    const explicit: UsageReport = {
      ...report,
      parameters: {
        "pkg.fn": { x: { "literal:None": 2, default: 2, "literal:5": 1 } },
        "pkg.io.read": { mode: { "literal:'r'": 3, "literal:'rb'": 1 } },
      },
    };

    expect(suggestImprovements(explicit, api, 2).fixableParameters).toEqual([
      { qname: "pkg.fn", parameter: "x", suggestedValue: "<default>", customisations: 1 },
      { qname: "pkg.io.read", parameter: "mode", suggestedValue: "<default>", customisations: 1 },
    ]);
  });

  it("reports and ignores entries outside the description", () => {
    const result = suggestImprovements(report, api, 2);
    expect(result.internalUsages).toEqual(["pkg._internal.setup"]);
    expect(result.unusedElements.map((e) => e.qname)).not.toContain("pkg._internal.setup");
  });

  it("flags nothing with a threshold of zero", () => {
    const result = suggestImprovements(report, api, 0);
    expect(result.unusedElements).toEqual([]);
    expect(result.rareValues).toEqual([]);
    expect(result.fixableParameters).toEqual([]);
  });
});
