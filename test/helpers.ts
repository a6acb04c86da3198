import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import type { RuntimeSettings } from "../src/config.js";
import { createServer } from "../src/server.js";
import type { OpenedContext } from "../src/server.js";
import type { HttpRequest, HttpResponse, HttpTransport } from "../src/upload/dispatcher.js";
import type { Endpoint } from "../src/types.js";
import { DEFAULT_PROBE_DOMAIN } from "../src/types.js";
import { DEFAULT_SHARE_CONTEXT } from "../src/upload/share.js";

export const PNG_BYTES = Uint8Array.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);
export const JPEG_BYTES = Uint8Array.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46]);

/** 2024-05-01T12:00:00Z */
export const FIXED_NOW = new Date(1714564800_000);
export const fixedClock = (): Date => FIXED_NOW;

export function makeEndpoint(overrides: Partial<Endpoint> = {}): Endpoint {
  return {
    id: "ep-1",
    name: "Home",
    device: "laptop",
    probeKey: "test-secret",
    nodeName: "acme",
    probeId: "42",
    keepScreenshots: false,
    screenshotFolder: "",
    ...overrides,
  };
}

type Responder = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

/** Records every request and answers with the responder (200 "ok" by default). */
export class FakeTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];

  constructor(private responder: Responder = () => ({ status: 200, body: "ok" })) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return this.responder(request);
  }

  /** Decoded JSON bodies of every request sent so far. */
  bodies(): Array<{
    file: { content: string; filename: string; content_type: string };
    tags: string;
    device: string;
    context_prompt?: string;
  }> {
    return this.requests.map((r) => JSON.parse(r.body));
  }
}

export function testSettings(overrides: Partial<RuntimeSettings> = {}): RuntimeSettings {
  return {
    storagePath: ":memory:",
    storageKind: "sqlite",
    probeDomain: DEFAULT_PROBE_DOMAIN,
    uploadTimeoutMs: 1000,
    shareContext: DEFAULT_SHARE_CONTEXT,
    ...overrides,
  };
}

/** An MCP client wired to a fresh server over the opened context. */
export async function connectClient(opened: OpenedContext): Promise<Client> {
  const server = createServer(opened.ctx);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: "kash-test", version: "0.0.0" });
  await client.connect(clientTransport);
  return client;
}

export interface ToolReply {
  isError: boolean;
  text: string;
}

export async function callTool(client: Client, name: string, args: Record<string, unknown> = {}): Promise<ToolReply> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const block = result.content[0];
  return { isError: result.isError === true, text: block?.type === "text" ? block.text : "" };
}
