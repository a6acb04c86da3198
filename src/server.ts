import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { RuntimeSettings } from "./config.js";
import { DatabaseManager, EventRepository } from "./db/index.js";
import { EndpointRegistry } from "./registry/endpoint-registry.js";
import { ConfigStore } from "./store/config-store.js";
import type { ConfigStorage } from "./store/storage.js";
import { JsonFileConfigStorage, SqliteConfigStorage } from "./store/storage.js";
import type { HttpTransport } from "./upload/dispatcher.js";
import { FetchTransport, UploadDispatcher } from "./upload/dispatcher.js";
import { ShareFanOut } from "./upload/share.js";
import type { ToolContext } from "./tools/shared.js";
import { registerEndpointTools } from "./tools/endpoint-tools.js";
import { registerShareTools } from "./tools/share-tools.js";
import { registerStatusTools } from "./tools/status-tools.js";
import { registerUploadTools } from "./tools/upload-tools.js";

export const SERVER_NAME = "kash-stash-mcp";
export const SERVER_VERSION = "0.1.0";

export interface OpenedContext {
  ctx: ToolContext;
  close(): void;
}

/**
 * Open storage and build the collaborators the tools share. SQLite storage
 * also gets an event log; a JSON file does not.
 */
export function openToolContext(
  settings: RuntimeSettings,
  opts: { transport?: HttpTransport; now?: () => Date } = {},
): OpenedContext {
  let storage: ConfigStorage;
  let events: EventRepository | null = null;
  let dbManager: DatabaseManager | null = null;

  if (settings.storageKind === "json") {
    storage = new JsonFileConfigStorage(settings.storagePath);
  } else {
    dbManager = new DatabaseManager();
    dbManager.open(settings.storagePath);
    dbManager.initialize();
    storage = new SqliteConfigStorage(dbManager.connection);
    events = new EventRepository(dbManager.connection);
  }

  const store = new ConfigStore(storage);
  const dispatcher = new UploadDispatcher({
    transport: opts.transport ?? new FetchTransport(settings.uploadTimeoutMs),
    domain: settings.probeDomain,
    events,
  });

  const ctx: ToolContext = {
    store,
    registry: new EndpointRegistry(store, events),
    dispatcher,
    share: new ShareFanOut(dispatcher, { fallbackContext: settings.shareContext, events, now: opts.now }),
    events,
    probeDomain: settings.probeDomain,
    now: opts.now,
  };

  return {
    ctx,
    close: () => dbManager?.close(),
  };
}

export function createServer(ctx: ToolContext): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
      title: "Kash Stash",
    },
    {
      instructions: [
        "This server uploads captured content to the user's Pulse Probes endpoints.",
        "",
        "Typical workflow:",
        "1. Check kash_status or list_endpoints. If there are none, add one with add_endpoint (or import_endpoint from a setup QR payload).",
        "2. Switch endpoints with set_current_endpoint when the user names a different destination.",
        "3. Upload with upload_note, upload_image or upload_file; several items at once with share_items.",
        "4. Tags are comma-separated; the endpoint's device tag is always added.",
        "",
        "Probe keys are secrets: they are masked in every tool result.",
      ].join("\n"),
    },
  );

  registerStatusTools(server, ctx);
  registerEndpointTools(server, ctx);
  registerUploadTools(server, ctx);
  registerShareTools(server, ctx);

  return server;
}
