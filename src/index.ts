#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { resolveSettings } from "./config.js";
import { createServer, openToolContext } from "./server.js";

async function main(): Promise<void> {
  const settings = resolveSettings();
  const { ctx, close } = openToolContext(settings);
  const server = createServer(ctx);

  process.on("SIGINT", () => {
    close();
    process.exit(0);
  });

  await server.connect(new StdioServerTransport());

  console.error(
    `kash-stash-mcp running (${settings.storageKind}: ${settings.storagePath}, ` +
      `${ctx.registry.list().length} endpoint(s))`,
  );
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
