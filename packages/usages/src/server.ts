#!/usr/bin/env node
/**
 * MCP server for usage extraction.
 */

import os from "node:os";
import path from "node:path";

import { runServer } from "@usagelens/core";

import { createServices } from "./services.js";
import { type Services, registerAllTools } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "usagelens:usages",
    version: "0.1.0",
  },
  createServices: () => createServices(process.env.USAGELENS_TMP_DIR ?? path.join(os.tmpdir(), "usagelens")),
  registerTools: registerAllTools,
});
