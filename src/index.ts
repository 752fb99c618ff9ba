#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createBackend, loadConfig } from "./storage/index.js";
import { FileOps } from "./fsops.js";
import { registerTools } from "./tools.js";

async function main() {
  const config = loadConfig();
  const backend = await createBackend(config);
  if (config.backend === "postgres" && config.autoInit) {
    console.error("[pathkit] Schema initialized successfully");
  }
  console.error(`[pathkit] Backend: ${config.backend}`);

  const ops = new FileOps(backend, { tempRoot: config.tempRoot });

  const server = new McpServer({
    name: "pathkit-fs",
    version: "1.0.0",
  });

  registerTools(server, ops);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = () => {
    backend.close().then(
      () => process.exit(0),
      (e: unknown) => {
        console.error("[pathkit] Shutdown failed:", e);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
