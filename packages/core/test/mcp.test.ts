import { describe, it, expect, vi, afterEach } from "vitest";
import { textResponse, errorResponse, resultToStructuredResponse } from "../src/mcp.js";
import { createLogger, silentLogger } from "../src/log.js";
import { Ok, Err } from "../src/result.js";
import type { Result } from "../src/result.js";

describe("MCP responses", () => {
  it("creates a text response", () => {
    expect(textResponse("done")).toEqual({ content: [{ type: "text", text: "done" }] });
  });

  it("creates an error response from a string or an Error", () => {
    const expected = {
      content: [{ type: "text", text: "Error: no such directory" }],
      structuredContent: { success: false, error: "no such directory" },
    };
    expect(errorResponse("no such directory")).toEqual(expected);
    expect(errorResponse(new Error("no such directory"))).toEqual(expected);
  });

  it("formats a successful result with structured data", () => {
    const result: Result<{ files: number }, Error> = Ok({ files: 3 });
    const response = resultToStructuredResponse(result, (value) => ({
      text: `Processed ${value.files} files`,
      data: { files: value.files },
    }));
    expect(response).toEqual({
      content: [{ type: "text", text: "Processed 3 files" }],
      structuredContent: { files: 3, success: true },
    });
  });

  it("turns a failed result into an error response", () => {
    const result: Result<{ files: number }, Error> = Err(new Error("bad root"));
    const response = resultToStructuredResponse(result, (value) => ({
      text: `Processed ${value.files} files`,
      data: { files: value.files },
    }));
    expect(response.structuredContent).toEqual({ success: false, error: "bad root" });
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes lines with the scope and writes to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = createLogger("usages");
    log.info("started");
    log.warn("slow file");
    expect(spy).toHaveBeenNthCalledWith(1, "[usages] started");
    expect(spy).toHaveBeenNthCalledWith(2, "[usages] Warning: slow file");
  });

  it("silentLogger writes nothing", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    silentLogger.error("ignored", new Error("x"));
    expect(spy).not.toHaveBeenCalled();
  });
});
