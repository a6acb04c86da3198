import { z } from "zod";
import type { EndpointInput } from "../types.js";
import { DEFAULT_PROBE_ID } from "../types.js";
import { InvalidParameterError } from "../errors.js";

export type ConfigPayloadType = "kashFiles" | "pod" | "mobile_endpoint" | "unknown";

/**
 * Classify a decoded configuration payload (the JSON text carried in a
 * setup QR code).
 */
export function detectConfigType(payload: Record<string, unknown>): ConfigPayloadType {
  if (payload["type"] === "kashFiles") return "kashFiles";
  if ("entrance_url" in payload && "preshared_key" in payload) return "pod";
  if ("probeKey" in payload) return "mobile_endpoint";
  return "unknown";
}

const optionalText = z.union([z.string(), z.number()]).transform(String).optional();

const mobileEndpointSchema = z.object({
  name: optionalText,
  device: optionalText,
  probeKey: z.string(),
  nodeName: optionalText,
  probeId: optionalText,
});

export function endpointInputFromMobileConfig(payload: Record<string, unknown>): EndpointInput {
  const parsed = mobileEndpointSchema.safeParse(payload);
  if (!parsed.success) {
    throw new InvalidParameterError("Mobile endpoint config must contain a string 'probeKey'.");
  }

  const cfg = parsed.data;
  return {
    name: cfg.name || "Imported from Mobile",
    device: cfg.device || "mobile",
    probeKey: cfg.probeKey,
    nodeName: cfg.nodeName ?? "",
    probeId: cfg.probeId || DEFAULT_PROBE_ID,
  };
}

/** Parse QR/JSON text into an endpoint input, rejecting payloads of any other kind. */
export function parseEndpointImport(text: string): EndpointInput {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    throw new InvalidParameterError("Config payload is not valid JSON.");
  }

  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    throw new InvalidParameterError("Config payload must be a JSON object.");
  }

  const record: Record<string, unknown> = { ...payload };
  const kind = detectConfigType(record);
  if (kind !== "mobile_endpoint") {
    throw new InvalidParameterError(`Config payload is a '${kind}' config, not an endpoint config.`);
  }

  return endpointInputFromMobileConfig(record);
}
