import type { Endpoint, EventSink, UploadOutcome, UploadPayload } from "../types.js";
import { DEFAULT_PROBE_DOMAIN } from "../types.js";
import { recordEvent } from "../db/repositories/event-repository.js";
import { checkProbeAddress } from "../registry/endpoint-registry.js";

export interface HttpRequest {
  method: "POST";
  url: string;
  headers: Record<string, string>;
  body: string;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/** Network capability. Rejects on transport failure (DNS, reset, timeout). */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export const DEFAULT_UPLOAD_TIMEOUT_MS = 30_000;
const MAX_DIAGNOSTIC_LENGTH = 500;

export class FetchTransport implements HttpTransport {
  constructor(private timeoutMs: number = DEFAULT_UPLOAD_TIMEOUT_MS) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    return { status: response.status, body: await response.text() };
  }
}

/**
 * The run URL of a probe. This shape is fixed by the receiving service.
 * Throws InvalidEndpointFieldError for a node name or probe id that would
 * point it at another host or path (documents written by other apps are
 * not validated on the way in).
 */
export function probeRunUrl(endpoint: Pick<Endpoint, "nodeName" | "probeId">, domain: string = DEFAULT_PROBE_DOMAIN): string {
  checkProbeAddress(endpoint);
  return `https://probes-${endpoint.nodeName.trim()}.${domain}/api/probes/${endpoint.probeId.trim()}/run`;
}

export interface UploadDispatcherOptions {
  transport?: HttpTransport;
  domain?: string;
  events?: EventSink | null;
}

export class UploadDispatcher {
  private transport: HttpTransport;
  private domain: string;
  private events: EventSink | null;

  constructor(opts: UploadDispatcherOptions = {}) {
    this.transport = opts.transport ?? new FetchTransport();
    this.domain = opts.domain ?? DEFAULT_PROBE_DOMAIN;
    this.events = opts.events ?? null;
  }

  /**
   * POST the payload to the endpoint's probe. Resolves with the outcome and
   * never rejects; only HTTP 200 counts as success.
   */
  async upload(payload: UploadPayload, endpoint: Endpoint): Promise<UploadOutcome> {
    const outcome = await this.send(payload, endpoint);

    console.error(
      `[upload] ${payload.file.filename} -> '${endpoint.name}': ` +
        (outcome.success ? "ok" : `failed (${outcome.status ?? "no response"})`),
    );
    recordEvent(this.events, outcome.success ? "UPLOAD_SUCCEEDED" : "UPLOAD_FAILED", {
      endpoint_id: endpoint.id,
      filename: payload.file.filename,
      content_type: payload.file.content_type,
      status: outcome.status,
    });

    return outcome;
  }

  private async send(payload: UploadPayload, endpoint: Endpoint): Promise<UploadOutcome> {
    let url: string;
    try {
      url = new URL(probeRunUrl(endpoint, this.domain)).toString();
    } catch {
      return { success: false, status: null, message: `Invalid probe URL for endpoint '${endpoint.name}'` };
    }

    let response: HttpResponse;
    try {
      response = await this.transport.send({
        method: "POST",
        url,
        headers: {
          "Content-Type": "application/json",
          "X-PROBE-KEY": endpoint.probeKey,
        },
        body: JSON.stringify(payload),
      });
    } catch (err) {
      return {
        success: false,
        status: null,
        message: `Upload error: ${err instanceof Error ? err.message : String(err)}`,
      };
    }

    const body = truncate(response.body.trim());
    if (response.status === 200) {
      return { success: true, status: 200, message: body || "Upload completed" };
    }
    return {
      success: false,
      status: response.status,
      message: body ? `Upload failed: ${response.status} ${body}` : `Upload failed: ${response.status}`,
    };
  }
}

function truncate(text: string): string {
  return text.length > MAX_DIAGNOSTIC_LENGTH ? `${text.slice(0, MAX_DIAGNOSTIC_LENGTH)}...` : text;
}
