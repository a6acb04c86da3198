import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { keepScreenshot } from "../../src/upload/screenshots.js";
import { PNG_BYTES } from "../helpers.js";

describe("keepScreenshot", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "kash-shots-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should write the file into a created folder", async () => {
    const folder = join(dir, "shots", "2024");

    const written = await keepScreenshot(
      { keepScreenshots: true, screenshotFolder: folder },
      "screenshot_1714564800.png",
      PNG_BYTES,
    );

    assert.equal(written, join(folder, "screenshot_1714564800.png"));
    assert.deepEqual(new Uint8Array(readFileSync(join(folder, "screenshot_1714564800.png"))), PNG_BYTES);
  });

  it("should keep only the base name of the file", async () => {
    const written = await keepScreenshot(
      { keepScreenshots: true, screenshotFolder: dir },
      "../../escape.png",
      PNG_BYTES,
    );
    assert.equal(written, join(dir, "escape.png"));
  });

  it("should do nothing when disabled or without a folder", async () => {
    assert.equal(await keepScreenshot({ keepScreenshots: false, screenshotFolder: dir }, "a.png", PNG_BYTES), null);
    assert.equal(await keepScreenshot({ keepScreenshots: true, screenshotFolder: "  " }, "a.png", PNG_BYTES), null);
    assert.equal(existsSync(join(dir, "a.png")), false);
  });

  it("should return null when the folder cannot be created", async () => {
    const blocker = join(dir, "not-a-dir");
    writeFileSync(blocker, "x");

    const written = await keepScreenshot(
      { keepScreenshots: true, screenshotFolder: blocker },
      "a.png",
      PNG_BYTES,
    );
    assert.equal(written, null);
  });
});
