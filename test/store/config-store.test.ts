import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DatabaseManager } from "../../src/db/database.js";
import { ConfigStore } from "../../src/store/config-store.js";
import type { ConfigStorage } from "../../src/store/storage.js";
import { JsonFileConfigStorage, SqliteConfigStorage } from "../../src/store/storage.js";
import type { Configuration } from "../../src/types.js";
import { makeEndpoint } from "../helpers.js";

const SAMPLE: Configuration = {
  endpoints: [
    makeEndpoint({ id: "ep-1", name: "Home" }),
    makeEndpoint({ id: "ep-2", name: "Work", device: "", keepScreenshots: true, screenshotFolder: "/tmp/shots" }),
  ],
  currentEndpointId: "ep-2",
};

class MemoryStorage implements ConfigStorage {
  readonly location = "memory";
  constructor(public document: string | null = null) {}
  read(): string | null {
    return this.document;
  }
  write(document: string): void {
    this.document = document;
  }
}

describe("ConfigStore over SQLite", () => {
  let dbm: DatabaseManager;
  let store: ConfigStore;

  beforeEach(() => {
    dbm = new DatabaseManager();
    dbm.open(":memory:");
    dbm.initialize();
    store = new ConfigStore(new SqliteConfigStorage(dbm.connection));
  });

  afterEach(() => {
    dbm.close();
  });

  it("should load the empty configuration when nothing was saved", () => {
    assert.deepEqual(store.load(), { endpoints: [], currentEndpointId: null });
  });

  it("should round-trip a configuration", () => {
    assert.equal(store.save(SAMPLE), true);
    assert.deepEqual(store.load(), SAMPLE);
  });

  it("should round-trip a configuration with no current endpoint", () => {
    const config: Configuration = { endpoints: [makeEndpoint()], currentEndpointId: null };
    store.save(config);
    assert.deepEqual(store.load(), config);
  });
});

describe("ConfigStore recovery", () => {
  it("should return the empty configuration for non-JSON content", () => {
    const store = new ConfigStore(new MemoryStorage("this is not json"));
    assert.deepEqual(store.load(), { endpoints: [], currentEndpointId: null });
  });

  it("should return the empty configuration for a truncated document", () => {
    const full = JSON.stringify({ endpoints: SAMPLE.endpoints, lastUsedEndpoint: "ep-2" });
    const store = new ConfigStore(new MemoryStorage(full.slice(0, full.length / 2)));
    assert.deepEqual(store.load(), { endpoints: [], currentEndpointId: null });
  });

  it("should return the empty configuration when reading throws", () => {
    const store = new ConfigStore({
      location: "broken",
      read() {
        throw new Error("EIO");
      },
      write() {},
    });
    assert.deepEqual(store.load(), { endpoints: [], currentEndpointId: null });
  });

  it("should report false when writing throws", () => {
    const store = new ConfigStore({
      location: "read-only",
      read: () => null,
      write() {
        throw new Error("EROFS: read-only file system");
      },
    });
    assert.equal(store.save(SAMPLE), false);
  });
});

describe("ConfigStore foreign keys and locking", () => {
  it("should keep keys it does not own when saving over a document", () => {
    const storage = new MemoryStorage(
      JSON.stringify({
        endpoints: [{ ...makeEndpoint({ id: "ep-1" }), DIGEST_PROBE_ID: "31" }],
        lastUsedEndpoint: "ep-1",
        POD_URL: "https://pod.example.com",
      }),
    );
    const store = new ConfigStore(storage);

    const config = store.load();
    assert.equal(store.save({ ...config, endpoints: [{ ...makeEndpoint({ id: "ep-1" }), name: "Renamed" }] }), true);

    const saved = JSON.parse(storage.document ?? "{}");
    assert.equal(saved.POD_URL, "https://pod.example.com");
    assert.equal(saved.endpoints[0].DIGEST_PROBE_ID, "31");
    assert.equal(saved.endpoints[0].name, "Renamed");
  });

  it("should run exclusive work through the storage lock when there is one", () => {
    let locked = 0;
    const storage = new MemoryStorage();
    const store = new ConfigStore({
      location: "locking",
      read: () => storage.read(),
      write: (document) => storage.write(document),
      exclusive<T>(fn: () => T): T {
        locked += 1;
        return fn();
      },
    });

    assert.equal(
      store.exclusive(() => store.save(SAMPLE)),
      true,
    );
    assert.equal(locked, 1);
    assert.equal(new ConfigStore(storage).exclusive(() => 7), 7);
  });
});

describe("ConfigStore over a JSON file", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "kash-stash-store-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should round-trip through the file", () => {
    const filePath = join(tmpDir, "kash_stash_config.json");
    assert.equal(new ConfigStore(new JsonFileConfigStorage(filePath)).save(SAMPLE), true);

    // A second reader of the same file, as a share process would be.
    assert.deepEqual(new ConfigStore(new JsonFileConfigStorage(filePath)).load(), SAMPLE);
  });

  it("should recover from a corrupt file", () => {
    const filePath = join(tmpDir, "kash_stash_config.json");
    writeFileSync(filePath, '{"endpoints": [', "utf-8");

    assert.deepEqual(new ConfigStore(new JsonFileConfigStorage(filePath)).load(), {
      endpoints: [],
      currentEndpointId: null,
    });
  });

  it("should report false when the target directory cannot be created", () => {
    const blocker = join(tmpDir, "blocker");
    writeFileSync(blocker, "file, not a directory", "utf-8");

    const store = new ConfigStore(new JsonFileConfigStorage(join(blocker, "config.json")));
    assert.equal(store.save(SAMPLE), false);
  });
});
