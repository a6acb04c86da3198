import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { EventRepository } from "../db/repositories/event-repository.js";
import type { EndpointRegistry } from "../registry/endpoint-registry.js";
import type { ConfigStore } from "../store/config-store.js";
import type { UploadDispatcher } from "../upload/dispatcher.js";
import type { ShareFanOut } from "../upload/share.js";
import type { Endpoint } from "../types.js";
import {
  EndpointNotFoundError,
  FileReadError,
  KashStashError,
  NoEndpointConfiguredError,
  isErrnoException,
} from "../errors.js";

/** Everything the tools need, built once per server in server.ts. */
export interface ToolContext {
  store: ConfigStore;
  registry: EndpointRegistry;
  dispatcher: UploadDispatcher;
  share: ShareFanOut;
  events: EventRepository | null;
  probeDomain: string;
  now?: () => Date;
}

export function jsonResult(value: unknown, isError = false): CallToolResult {
  const result: CallToolResult = {
    content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
  };
  if (isError) result.isError = true;
  return result;
}

/** Known failures become tool errors; anything else is rethrown to the SDK. */
export function toolError(err: unknown): CallToolResult {
  if (err instanceof KashStashError) {
    return { isError: true, content: [{ type: "text", text: err.message }] };
  }
  throw err;
}

export function maskSecret(secret: string): string {
  return secret.length <= 4 ? "****" : `****${secret.slice(-4)}`;
}

export function presentEndpoint(endpoint: Endpoint, currentId: string | null): Record<string, unknown> {
  return {
    id: endpoint.id,
    name: endpoint.name,
    device: endpoint.device,
    node_name: endpoint.nodeName,
    probe_id: endpoint.probeId,
    probe_key: maskSecret(endpoint.probeKey),
    keep_screenshots: endpoint.keepScreenshots,
    screenshot_folder: endpoint.screenshotFolder,
    current: endpoint.id === currentId,
  };
}

/** The endpoint named by `endpointId`, or the current one. */
export function requireEndpoint(ctx: ToolContext, endpointId?: string): Endpoint {
  if (endpointId !== undefined) {
    const endpoint = ctx.registry.get(endpointId);
    if (!endpoint) throw new EndpointNotFoundError(endpointId);
    return endpoint;
  }
  const current = ctx.registry.resolveCurrent();
  if (!current) throw new NoEndpointConfiguredError();
  return current;
}

export async function readInputFile(filePath: string): Promise<{ absolutePath: string; bytes: Buffer }> {
  const absolutePath = resolve(filePath);
  let bytes: Buffer;

  try {
    bytes = await readFile(absolutePath);
  } catch (err: unknown) {
    let cause = "Unknown error";

    if (isErrnoException(err) && err.code === "ENOENT") {
      cause = "File not found";
    } else if (isErrnoException(err) && err.code === "EACCES") {
      cause = "Permission denied";
    } else if (isErrnoException(err) && err.code === "EISDIR") {
      cause = "Path is a directory, not a file";
    } else if (err instanceof Error && err.message) {
      cause = err.message;
    }

    throw new FileReadError(filePath, cause);
  }

  if (bytes.length === 0) {
    throw new FileReadError(filePath, "File is empty");
  }

  return { absolutePath, bytes };
}
