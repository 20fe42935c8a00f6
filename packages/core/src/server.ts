/**
 * MCP server bootstrap shared by every package.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { createLogger } from "./log.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Factory function to create services */
  createServices: () => S | Promise<S>;

  /** Function to register all tools with the server */
  registerTools: (server: McpServer, services: S) => void;

  /** Optional callback before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  /** Optional callback on SIGTERM/SIGINT */
  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Create services, register tools, hook signals and connect over stdio.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "usagelens:usages", version: "0.1.0" },
 *   createServices: () => ({ usages: new UsageService(...) }),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      createLogger(config.name).error("Shutdown failed:", error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  await onStartup?.(services);

  await server.connect(transport);
}

/**
 * Run bootstrapServer and exit non-zero on a fatal startup error.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    createLogger(options.config.name).error("Fatal error:", error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
