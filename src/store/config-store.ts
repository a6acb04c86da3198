import type { Configuration } from "../types.js";
import { emptyConfiguration } from "../types.js";
import { decodeConfiguration, encodeConfiguration } from "./document.js";
import type { ConfigStorage } from "./storage.js";

export class ConfigStore {
  constructor(private storage: ConfigStorage) {}

  get location(): string {
    return this.storage.location;
  }

  /** Never throws: anything unreadable comes back as an empty configuration. */
  load(): Configuration {
    let raw: string | null;
    try {
      raw = this.storage.read();
    } catch (err) {
      console.error(`[config] Failed to read ${this.storage.location}:`, describe(err));
      return emptyConfiguration();
    }

    if (raw === null) return emptyConfiguration();

    try {
      return decodeConfiguration(raw);
    } catch (err) {
      console.error(`[config] Ignoring undecodable configuration at ${this.storage.location}:`, describe(err));
      return emptyConfiguration();
    }
  }

  /**
   * Keys this app does not own (other apps' settings in a shared document)
   * are copied over from the document being replaced.
   */
  save(config: Configuration): boolean {
    try {
      this.storage.write(encodeConfiguration(config, this.readPrevious()));
      return true;
    } catch (err) {
      console.error(`[config] Failed to save configuration to ${this.storage.location}:`, describe(err));
      return false;
    }
  }

  /** Run `fn` holding the storage's write lock, where it has one. */
  exclusive<T>(fn: () => T): T {
    return this.storage.exclusive ? this.storage.exclusive(fn) : fn();
  }

  private readPrevious(): string | null {
    try {
      return this.storage.read();
    } catch (err) {
      console.error(`[config] Could not read ${this.storage.location} before saving:`, describe(err));
      return null;
    }
  }
}

// First line of the message only.
function describe(err: unknown): string {
  if (err instanceof Error) return err.message.split("\n")[0] ?? err.name;
  return String(err);
}
