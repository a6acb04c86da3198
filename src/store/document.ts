import { z } from "zod";
import { v5 as uuidv5 } from "uuid";
import type { Configuration, Endpoint, EndpointId } from "../types.js";

// Namespace for ids given to legacy endpoints that were stored without one.
const LEGACY_ENDPOINT_NAMESPACE = "6f1c8f44-2b7e-4d0a-9c55-3e1f0a8d2b61";

// Desktop documents use upper-snake keys for the probe settings.
const LEGACY_KEYS: Record<string, keyof Endpoint> = {
  PROBE_KEY: "probeKey",
  NODE_NAME: "nodeName",
  PROBE_ID: "probeId",
  DEVICE: "device",
  KEEP_SCREENSHOTS: "keepScreenshots",
  SCREENSHOT_FOLDER: "screenshotFolder",
};

function normalizeEndpointKeys(raw: unknown): unknown {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return raw;

  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    const mapped = LEGACY_KEYS[key];
    if (mapped) {
      if (!(mapped in normalized)) normalized[mapped] = value;
    } else {
      normalized[key] = value;
    }
  }
  return normalized;
}

const ENDPOINT_FIELDS: ReadonlySet<string> = new Set([
  "id",
  "name",
  "device",
  "probeKey",
  "nodeName",
  "probeId",
  "keepScreenshots",
  "screenshotFolder",
  ...Object.keys(LEGACY_KEYS),
]);

const DOCUMENT_FIELDS: ReadonlySet<string> = new Set(["endpoints", "lastUsedEndpoint", "last_used_endpoint"]);

function legacyEndpointId(index: number, name: string): EndpointId {
  return uuidv5(`${index}:${name}`, LEGACY_ENDPOINT_NAMESPACE);
}

const storedEndpointSchema = z.preprocess(
  normalizeEndpointKeys,
  z.object({
    id: z.string().min(1).optional(),
    name: z.string(),
    device: z.string().default(""),
    probeKey: z.string(),
    nodeName: z.string(),
    probeId: z.union([z.string(), z.number()]).transform(String),
    keepScreenshots: z.boolean().default(false),
    screenshotFolder: z.string().default(""),
  }),
);

const endpointReferenceSchema = z.union([z.string(), z.number().int(), z.null()]).optional();

const storedDocumentSchema = z.object({
  endpoints: z.array(storedEndpointSchema).default([]),
  lastUsedEndpoint: endpointReferenceSchema,
  last_used_endpoint: endpointReferenceSchema,
});

/**
 * Parse a persisted configuration document. Throws on malformed JSON or a
 * document that does not match the schema.
 *
 * Older documents are migrated on the way in: endpoints without an id get a
 * stable one derived from their position and name, and an index-based
 * current-endpoint reference becomes the id at that position.
 */
export function decodeConfiguration(raw: string): Configuration {
  const parsed: unknown = JSON.parse(raw);
  const doc = storedDocumentSchema.parse(parsed);

  const endpoints: Endpoint[] = doc.endpoints.map((ep, index) => ({
    id: ep.id ?? legacyEndpointId(index, ep.name),
    name: ep.name,
    device: ep.device,
    probeKey: ep.probeKey,
    nodeName: ep.nodeName,
    probeId: ep.probeId,
    keepScreenshots: ep.keepScreenshots,
    screenshotFolder: ep.screenshotFolder,
  }));

  const reference = doc.lastUsedEndpoint ?? doc.last_used_endpoint ?? null;
  let currentEndpointId: string | null;
  if (typeof reference === "number") {
    currentEndpointId = endpoints[reference]?.id ?? null;
  } else {
    currentEndpointId = reference;
  }

  return { endpoints, currentEndpointId };
}

// Anything that parses as an object with an endpoints array will do here.
const looseDocumentSchema = z
  .object({
    endpoints: z.array(z.record(z.unknown())).catch([]),
  })
  .passthrough();

interface ForeignKeys {
  document: Record<string, unknown>;
  endpoints: Map<EndpointId, Record<string, unknown>>;
}

/**
 * Keys of a stored document that no field of Configuration accounts for,
 * at the top level and per endpoint (matched by id, or by the id a legacy
 * endpoint decodes to).
 */
export function foreignKeys(raw: string | null): ForeignKeys {
  const keys: ForeignKeys = { document: {}, endpoints: new Map() };
  if (raw === null) return keys;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return keys;
  }
  const doc = looseDocumentSchema.safeParse(parsed);
  if (!doc.success) return keys;

  for (const [key, value] of Object.entries(doc.data)) {
    if (!DOCUMENT_FIELDS.has(key)) keys.document[key] = value;
  }

  doc.data.endpoints.forEach((ep, index) => {
    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(ep)) {
      if (!ENDPOINT_FIELDS.has(key)) extra[key] = value;
    }
    const storedId = ep["id"];
    const id = typeof storedId === "string" && storedId !== "" ? storedId : legacyEndpointId(index, String(ep["name"]));
    keys.endpoints.set(id, extra);
  });

  return keys;
}

/**
 * Serialize a configuration. When `previous` (the document being replaced)
 * is given, its foreign keys are written back unchanged.
 */
export function encodeConfiguration(config: Configuration, previous: string | null = null): string {
  const foreign = foreignKeys(previous);
  return JSON.stringify(
    {
      ...foreign.document,
      endpoints: config.endpoints.map((ep) => ({ ...foreign.endpoints.get(ep.id), ...ep })),
      lastUsedEndpoint: config.currentEndpointId,
    },
    null,
    2,
  );
}
