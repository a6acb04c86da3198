import { v7 as uuidv7 } from "uuid";
import type { Configuration, Endpoint, EndpointId, EndpointInput, EventSink } from "../types.js";
import { InvalidEndpointError, InvalidEndpointFieldError } from "../errors.js";
import type { ConfigStore } from "../store/config-store.js";
import { recordEvent } from "../db/repositories/event-repository.js";

const REQUIRED_FIELDS = ["name", "nodeName", "probeKey", "probeId"] as const;

// nodeName becomes a DNS label of the probe host, probeId a path segment.
const NODE_NAME_PATTERN = /^[A-Za-z0-9-]+$/;
const PROBE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Rejects node names and probe ids that would change the probe URL's host or path. */
export function checkProbeAddress(endpoint: Pick<Endpoint, "nodeName" | "probeId">): void {
  const nodeName = endpoint.nodeName.trim();
  if (!NODE_NAME_PATTERN.test(nodeName)) {
    throw new InvalidEndpointFieldError("nodeName", nodeName, "letters, digits and '-'");
  }
  const probeId = endpoint.probeId.trim();
  if (!PROBE_ID_PATTERN.test(probeId)) {
    throw new InvalidEndpointFieldError("probeId", probeId, "letters, digits, '-' and '_'");
  }
}

/**
 * The active endpoint: the one named by `currentEndpointId`, else the first
 * in the list, else null. Every reader of the configuration goes through here.
 */
export function resolveCurrentEndpoint(config: Configuration): Endpoint | null {
  if (config.currentEndpointId !== null) {
    const match = config.endpoints.find((ep) => ep.id === config.currentEndpointId);
    if (match) return match;
  }
  return config.endpoints[0] ?? null;
}

/** Trims every field, applies defaults and rejects blank required ones and unusable probe addresses. */
export function validateEndpoint(input: EndpointInput): Omit<Endpoint, "id"> {
  const fields = {
    name: input.name.trim(),
    device: input.device.trim(),
    probeKey: input.probeKey.trim(),
    nodeName: input.nodeName.trim(),
    probeId: input.probeId.trim(),
    keepScreenshots: input.keepScreenshots ?? false,
    screenshotFolder: (input.screenshotFolder ?? "").trim(),
  };

  const blank = REQUIRED_FIELDS.filter((field) => fields[field] === "");
  if (blank.length > 0) throw new InvalidEndpointError(blank);
  checkProbeAddress(fields);

  return fields;
}

/**
 * Endpoint list and current selection over a ConfigStore. Nothing is cached:
 * every read loads the stored document and every mutation is a
 * load-modify-save under the store's write lock, so another process writing
 * the same storage is never overwritten with stale state.
 */
export class EndpointRegistry {
  constructor(
    private store: ConfigStore,
    private events: EventSink | null = null,
  ) {}

  list(): Endpoint[] {
    return this.store.load().endpoints;
  }

  get(id: EndpointId): Endpoint | null {
    return this.store.load().endpoints.find((e) => e.id === id) ?? null;
  }

  currentEndpointId(): EndpointId | null {
    return this.store.load().currentEndpointId;
  }

  resolveCurrent(): Endpoint | null {
    return resolveCurrentEndpoint(this.store.load());
  }

  add(input: EndpointInput): { endpoint: Endpoint; persisted: boolean } {
    const endpoint: Endpoint = { id: uuidv7(), ...validateEndpoint(input) };

    const persisted = this.store.exclusive(() => {
      const config = this.store.load();
      return this.store.save({
        endpoints: [...config.endpoints, endpoint],
        currentEndpointId: endpoint.id,
      });
    });

    if (persisted) {
      recordEvent(this.events, "ENDPOINT_ADDED", { endpoint_id: endpoint.id, name: endpoint.name });
      console.error(`[config] Added endpoint '${endpoint.name}' (${endpoint.id})`);
    }

    return { endpoint, persisted };
  }

  /** Replaces the endpoint with the same id, keeping its position. Unknown ids are a no-op. */
  update(endpoint: Endpoint): { endpoint: Endpoint | null; persisted: boolean } {
    const valid: Endpoint = { id: endpoint.id, ...validateEndpoint(endpoint) };

    const result = this.store.exclusive(() => {
      const config = this.store.load();
      const index = config.endpoints.findIndex((ep) => ep.id === valid.id);
      if (index === -1) return { endpoint: null, persisted: false };

      const endpoints = [...config.endpoints];
      endpoints[index] = valid;
      return { endpoint: valid, persisted: this.store.save({ ...config, endpoints }) };
    });

    if (result.persisted) {
      recordEvent(this.events, "ENDPOINT_UPDATED", { endpoint_id: valid.id, name: valid.name });
    }

    return result;
  }

  delete(id: EndpointId): { deleted: boolean; currentEndpointId: EndpointId | null; persisted: boolean } {
    const result = this.store.exclusive(() => {
      const config = this.store.load();
      const removed = config.endpoints.find((ep) => ep.id === id);
      if (!removed) {
        return { removed: null, currentEndpointId: config.currentEndpointId, persisted: false };
      }

      const endpoints = config.endpoints.filter((ep) => ep.id !== id);
      const currentEndpointId =
        config.currentEndpointId === id ? (endpoints[0]?.id ?? null) : config.currentEndpointId;

      return { removed, currentEndpointId, persisted: this.store.save({ endpoints, currentEndpointId }) };
    });

    const { removed, currentEndpointId, persisted } = result;
    if (removed && persisted) {
      recordEvent(this.events, "ENDPOINT_DELETED", { endpoint_id: id, name: removed.name });
      console.error(`[config] Deleted endpoint '${removed.name}' (${id})`);
    }

    return { deleted: removed !== null, currentEndpointId, persisted };
  }

  /** Does not check that `id` is in the list; callers that take user input do. */
  setCurrent(id: EndpointId): boolean {
    const persisted = this.store.exclusive(() => {
      const config = this.store.load();
      return this.store.save({ ...config, currentEndpointId: id });
    });

    if (persisted) {
      recordEvent(this.events, "CURRENT_ENDPOINT_SET", { endpoint_id: id });
    }

    return persisted;
  }
}
