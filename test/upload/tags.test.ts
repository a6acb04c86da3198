import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { mergeTags } from "../../src/upload/tags.js";

describe("mergeTags", () => {
  it("should append the device tag after trimmed user tags", () => {
    assert.equal(mergeTags(" work , ideas ", "laptop"), "work,ideas,laptop");
  });

  it("should drop case-insensitive duplicates keeping the first spelling", () => {
    assert.equal(mergeTags("Work,work,IDEAS,ideas", "Laptop"), "Work,IDEAS,Laptop");
  });

  it("should not repeat a device tag the user already gave", () => {
    assert.equal(mergeTags("LAPTOP,notes", "laptop"), "LAPTOP,notes");
  });

  it("should skip empty pieces and an empty device", () => {
    assert.equal(mergeTags(",, a ,,", ""), "a");
    assert.equal(mergeTags("", "  "), "");
    assert.equal(mergeTags("", "phone"), "phone");
  });

  it("should be idempotent", () => {
    const once = mergeTags("b, A ,a,c", "phone");
    assert.equal(mergeTags(once, "phone"), once);
  });
});
