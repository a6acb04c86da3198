import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { EndpointInput } from "../types.js";
import { DEFAULT_PROBE_ID } from "../types.js";
import { EndpointNotFoundError } from "../errors.js";
import { parseEndpointImport } from "../registry/endpoint-import.js";
import type { ToolContext } from "./shared.js";
import { jsonResult, presentEndpoint, toolError } from "./shared.js";

function notSavedWarning(ctx: ToolContext): string {
  return `The change was not applied: it could not be saved to ${ctx.store.location}.`;
}

export function registerEndpointTools(server: McpServer, ctx: ToolContext): void {
  const { registry } = ctx;

  server.registerTool(
    "list_endpoints",
    {
      description:
        "List configured upload endpoints in display order. The current endpoint is marked; " +
        "probe keys are masked.",
    },
    async () => {
      const current = registry.resolveCurrent();
      const currentId = current?.id ?? null;
      return jsonResult({
        current_endpoint_id: currentId,
        endpoints: registry.list().map((ep) => presentEndpoint(ep, currentId)),
      });
    },
  );

  server.registerTool(
    "add_endpoint",
    {
      description:
        "Add an upload endpoint (a Pulse Probes ingest probe). Name, probe key, node name and probe ID are required. " +
        "The new endpoint becomes the current one.",
      inputSchema: {
        name: z.string().describe("Display name."),
        probe_key: z.string().describe("X-PROBE-KEY credential for the probe."),
        node_name: z.string().describe("Node name; the probe host is probes-<node_name>.<domain>."),
        probe_id: z.string().optional().describe(`Probe ID (default ${DEFAULT_PROBE_ID}).`),
        device: z.string().optional().describe("Device tag added to every upload from this endpoint."),
        keep_screenshots: z.boolean().optional().describe("Keep local copies of uploaded screenshots."),
        screenshot_folder: z.string().optional().describe("Folder for kept screenshots."),
      },
    },
    async ({ name, probe_key, node_name, probe_id, device, keep_screenshots, screenshot_folder }) => {
      try {
        const { endpoint, persisted } = registry.add({
          name,
          probeKey: probe_key,
          nodeName: node_name,
          probeId: probe_id ?? DEFAULT_PROBE_ID,
          device: device ?? "",
          keepScreenshots: keep_screenshots,
          screenshotFolder: screenshot_folder,
        });

        return jsonResult(
          {
            endpoint: presentEndpoint(endpoint, registry.currentEndpointId()),
            persisted,
            ...(persisted ? {} : { warning: notSavedWarning(ctx) }),
          },
          !persisted,
        );
      } catch (err) {
        return toolError(err);
      }
    },
  );

  server.registerTool(
    "update_endpoint",
    {
      description: "Edit an endpoint in place. Omitted fields keep their current value.",
      inputSchema: {
        id: z.string().describe("ID of the endpoint to edit."),
        name: z.string().optional(),
        probe_key: z.string().optional(),
        node_name: z.string().optional(),
        probe_id: z.string().optional(),
        device: z.string().optional(),
        keep_screenshots: z.boolean().optional(),
        screenshot_folder: z.string().optional(),
      },
    },
    async ({ id, name, probe_key, node_name, probe_id, device, keep_screenshots, screenshot_folder }) => {
      try {
        const existing = registry.get(id);
        if (!existing) throw new EndpointNotFoundError(id);

        const { endpoint, persisted } = registry.update({
          id,
          name: name ?? existing.name,
          probeKey: probe_key ?? existing.probeKey,
          nodeName: node_name ?? existing.nodeName,
          probeId: probe_id ?? existing.probeId,
          device: device ?? existing.device,
          keepScreenshots: keep_screenshots ?? existing.keepScreenshots,
          screenshotFolder: screenshot_folder ?? existing.screenshotFolder,
        });
        if (!endpoint) throw new EndpointNotFoundError(id);

        return jsonResult(
          {
            endpoint: presentEndpoint(endpoint, registry.resolveCurrent()?.id ?? null),
            persisted,
            ...(persisted ? {} : { warning: notSavedWarning(ctx) }),
          },
          !persisted,
        );
      } catch (err) {
        return toolError(err);
      }
    },
  );

  server.registerTool(
    "delete_endpoint",
    {
      description:
        "Delete an endpoint. If it was current, the first remaining endpoint becomes current.",
      inputSchema: {
        id: z.string().describe("ID of the endpoint to delete."),
      },
    },
    async ({ id }) => {
      try {
        const { deleted, currentEndpointId, persisted } = registry.delete(id);
        if (!deleted) throw new EndpointNotFoundError(id);

        return jsonResult(
          {
            deleted_id: id,
            current_endpoint_id: currentEndpointId,
            remaining: registry.list().length,
            persisted,
            ...(persisted ? {} : { warning: notSavedWarning(ctx) }),
          },
          !persisted,
        );
      } catch (err) {
        return toolError(err);
      }
    },
  );

  server.registerTool(
    "set_current_endpoint",
    {
      description: "Switch the current endpoint used for uploads and shares.",
      inputSchema: {
        id: z.string().describe("ID of the endpoint to make current."),
      },
    },
    async ({ id }) => {
      try {
        const endpoint = registry.get(id);
        if (!endpoint) throw new EndpointNotFoundError(id);

        const persisted = registry.setCurrent(id);
        return jsonResult(
          {
            message: `Switched to: ${endpoint.name}`,
            current_endpoint_id: id,
            persisted,
            ...(persisted ? {} : { warning: notSavedWarning(ctx) }),
          },
          !persisted,
        );
      } catch (err) {
        return toolError(err);
      }
    },
  );

  server.registerTool(
    "import_endpoint",
    {
      description:
        "Add an endpoint from a mobile endpoint config (the JSON text encoded in a setup QR code). " +
        "The imported endpoint becomes current.",
      inputSchema: {
        config_json: z.string().min(1).describe("Decoded QR payload, e.g. {\"probeKey\": ..., \"nodeName\": ...}."),
        name: z.string().optional().describe("Override the imported display name."),
        device: z.string().optional().describe("Override the imported device tag."),
      },
    },
    async ({ config_json, name, device }) => {
      try {
        const imported: EndpointInput = parseEndpointImport(config_json);
        const { endpoint, persisted } = registry.add({
          ...imported,
          name: name ?? imported.name,
          device: device ?? imported.device,
        });

        return jsonResult(
          {
            endpoint: presentEndpoint(endpoint, registry.currentEndpointId()),
            persisted,
            ...(persisted ? {} : { warning: notSavedWarning(ctx) }),
          },
          !persisted,
        );
      } catch (err) {
        return toolError(err);
      }
    },
  );
}
