// ---- Identifiers ----

export type EndpointId = string; // UUID

// ---- Endpoint ----

export interface Endpoint {
  id: EndpointId;
  name: string;
  device: string;
  probeKey: string;
  nodeName: string;
  probeId: string;
  keepScreenshots: boolean;
  screenshotFolder: string;
}

/** Everything an add/edit form supplies; the id is assigned by the registry. */
export type EndpointInput = Omit<Endpoint, "id" | "keepScreenshots" | "screenshotFolder"> & {
  keepScreenshots?: boolean;
  screenshotFolder?: string;
};

// ---- Configuration ----

export interface Configuration {
  endpoints: Endpoint[];
  currentEndpointId: EndpointId | null;
}

// ---- Upload payload (wire format) ----

export interface UploadPayload {
  file: {
    content: string; // base64
    filename: string;
    content_type: string;
  };
  tags: string;
  device: string;
  context_prompt?: string;
}

export interface UploadOutcome {
  success: boolean;
  status: number | null;
  message: string;
}

// ---- Events ----

export const EVENT_TYPES = [
  "DB_INITIALIZED",
  "ENDPOINT_ADDED",
  "ENDPOINT_UPDATED",
  "ENDPOINT_DELETED",
  "CURRENT_ENDPOINT_SET",
  "UPLOAD_SUCCEEDED",
  "UPLOAD_FAILED",
  "SHARE_COMPLETED",
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export interface KashEvent {
  event_id: number;
  event_type: EventType;
  timestamp: string;
  payload: string; // JSON
}

/** Where audit events go. Implemented by EventRepository on SQLite storage. */
export interface EventSink {
  append(eventType: EventType, payload: Record<string, unknown>): unknown;
}

// ---- Constants ----

export const DEFAULT_PROBE_DOMAIN = "xyzpulseinfra.com";
export const DEFAULT_PROBE_ID = "29";

export function emptyConfiguration(): Configuration {
  return { endpoints: [], currentEndpointId: null };
}
