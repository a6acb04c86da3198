import { homedir } from "node:os";
import { join } from "node:path";
import { DEFAULT_PROBE_DOMAIN } from "./types.js";
import { DEFAULT_UPLOAD_TIMEOUT_MS } from "./upload/dispatcher.js";
import { DEFAULT_SHARE_CONTEXT } from "./upload/share.js";

export type StorageKind = "sqlite" | "json";

export interface RuntimeSettings {
  storagePath: string;
  storageKind: StorageKind;
  probeDomain: string;
  uploadTimeoutMs: number;
  shareContext: string;
}

type Env = Record<string, string | undefined>;

/**
 * Resolve the storage path from explicit configuration, in order:
 * CLI argument, KASH_STASH_CONFIG_PATH, KASH_STASH_HOME, then ~/.kash-stash.
 */
export function resolveStoragePath(argv: readonly string[], env: Env): string {
  if (argv[2]) return argv[2];
  if (env["KASH_STASH_CONFIG_PATH"]) return env["KASH_STASH_CONFIG_PATH"];

  const home = env["KASH_STASH_HOME"] || join(homedir(), ".kash-stash");
  return join(home, "kash-stash.sqlite");
}

export function resolveSettings(argv: readonly string[] = process.argv, env: Env = process.env): RuntimeSettings {
  const storagePath = resolveStoragePath(argv, env);

  const timeout = Number(env["KASH_STASH_UPLOAD_TIMEOUT_MS"]);
  const uploadTimeoutMs = Number.isInteger(timeout) && timeout > 0 ? timeout : DEFAULT_UPLOAD_TIMEOUT_MS;

  return {
    storagePath,
    storageKind: storagePath.toLowerCase().endsWith(".json") ? "json" : "sqlite",
    probeDomain: env["KASH_STASH_PROBE_DOMAIN"]?.trim() || DEFAULT_PROBE_DOMAIN,
    uploadTimeoutMs,
    shareContext: env["KASH_STASH_SHARE_CONTEXT"]?.trim() || DEFAULT_SHARE_CONTEXT,
  };
}
