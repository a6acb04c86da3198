import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { eventQuerySchema } from "../db/repositories/event-repository.js";
import { KashStashError } from "../errors.js";
import { probeRunUrl } from "../upload/dispatcher.js";
import type { ToolContext } from "./shared.js";
import { jsonResult } from "./shared.js";

export function registerStatusTools(server: McpServer, ctx: ToolContext): void {
  server.registerTool(
    "kash_status",
    {
      description:
        "Show where configuration is stored, how many endpoints exist, the current endpoint and its probe URL, " +
        "and event counts.",
    },
    async () => {
      const current = ctx.registry.resolveCurrent();
      let url: string | null = null;
      if (current) {
        try {
          url = probeRunUrl(current, ctx.probeDomain);
        } catch (err) {
          if (!(err instanceof KashStashError)) throw err;
          console.error(`[config] Current endpoint '${current.name}' has no usable probe URL:`, err.message);
        }
      }

      return jsonResult({
        storage: ctx.store.location,
        endpoints: ctx.registry.list().length,
        current_endpoint: current
          ? { id: current.id, name: current.name, url }
          : null,
        events: ctx.events ? ctx.events.countByType() : null,
      });
    },
  );

  server.registerTool(
    "list_events",
    {
      description:
        "List recent audit events (endpoint changes, upload outcomes, share results), newest first. " +
        "Only available with SQLite storage.",
      inputSchema: eventQuerySchema.shape,
    },
    async (filter) => {
      if (!ctx.events) {
        return jsonResult({ message: `Event log is not available for ${ctx.store.location}.` }, true);
      }

      const events = ctx.events.query(filter);
      return jsonResult(
        events.map((e) => ({
          event_id: e.event_id,
          event_type: e.event_type,
          timestamp: e.timestamp,
          payload: JSON.parse(e.payload),
        })),
      );
    },
  );
}
