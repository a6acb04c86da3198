import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DatabaseManager } from "../../src/db/database.js";
import { EventRepository } from "../../src/db/repositories/event-repository.js";
import { UploadDispatcher, probeRunUrl } from "../../src/upload/dispatcher.js";
import { buildTextPayload } from "../../src/upload/payload.js";
import { InvalidEndpointFieldError } from "../../src/errors.js";
import { FakeTransport, fixedClock, makeEndpoint } from "../helpers.js";

const endpoint = makeEndpoint();
const payload = buildTextPayload({ text: "hello", tags: "", endpoint, now: fixedClock });

describe("probeRunUrl", () => {
  it("should build the run URL from node name and probe id", () => {
    assert.equal(probeRunUrl(endpoint), "https://probes-acme.xyzpulseinfra.com/api/probes/42/run");
  });

  it("should trim fields and honor a custom domain", () => {
    assert.equal(
      probeRunUrl({ nodeName: " acme ", probeId: " 7 " }, "probes.test"),
      "https://probes-acme.probes.test/api/probes/7/run",
    );
  });

  it("should refuse a node name or probe id that would move the request", () => {
    assert.throws(() => probeRunUrl({ nodeName: "evil.example/x?", probeId: "42" }), InvalidEndpointFieldError);
    assert.throws(() => probeRunUrl({ nodeName: "acme", probeId: "../../admin" }), InvalidEndpointFieldError);
  });
});

describe("UploadDispatcher", () => {
  it("should POST the JSON payload with the probe key header", async () => {
    const transport = new FakeTransport();
    const dispatcher = new UploadDispatcher({ transport });

    const outcome = await dispatcher.upload(payload, endpoint);

    assert.deepEqual(outcome, { success: true, status: 200, message: "ok" });
    assert.equal(transport.requests.length, 1);
    const [request] = transport.requests;
    assert.equal(request?.method, "POST");
    assert.equal(request?.url, "https://probes-acme.xyzpulseinfra.com/api/probes/42/run");
    assert.deepEqual(request?.headers, {
      "Content-Type": "application/json",
      "X-PROBE-KEY": "test-secret",
    });
    assert.deepEqual(transport.bodies()[0], payload);
  });

  it("should report a default message for an empty 200 body", async () => {
    const dispatcher = new UploadDispatcher({ transport: new FakeTransport(() => ({ status: 200, body: "  " })) });
    assert.deepEqual(await dispatcher.upload(payload, endpoint), {
      success: true,
      status: 200,
      message: "Upload completed",
    });
  });

  it("should treat any non-200 status as failure", async () => {
    const created = new UploadDispatcher({ transport: new FakeTransport(() => ({ status: 201, body: "" })) });
    assert.deepEqual(await created.upload(payload, endpoint), {
      success: false,
      status: 201,
      message: "Upload failed: 201",
    });

    const denied = new UploadDispatcher({
      transport: new FakeTransport(() => ({ status: 403, body: "bad key\n" })),
    });
    assert.deepEqual(await denied.upload(payload, endpoint), {
      success: false,
      status: 403,
      message: "Upload failed: 403 bad key",
    });
  });

  it("should truncate long response bodies", async () => {
    const dispatcher = new UploadDispatcher({
      transport: new FakeTransport(() => ({ status: 500, body: "x".repeat(600) })),
    });
    const outcome = await dispatcher.upload(payload, endpoint);
    assert.equal(outcome.message, `Upload failed: 500 ${"x".repeat(500)}...`);
  });

  it("should resolve with a failure when the transport rejects", async () => {
    const dispatcher = new UploadDispatcher({
      transport: new FakeTransport(() => {
        throw new Error("getaddrinfo ENOTFOUND");
      }),
    });
    assert.deepEqual(await dispatcher.upload(payload, endpoint), {
      success: false,
      status: null,
      message: "Upload error: getaddrinfo ENOTFOUND",
    });
  });

  it("should not send anything when the URL cannot be built", async () => {
    const transport = new FakeTransport();
    const dispatcher = new UploadDispatcher({ transport });

    const outcome = await dispatcher.upload(payload, makeEndpoint({ name: "Broken", nodeName: "has space" }));

    assert.deepEqual(outcome, {
      success: false,
      status: null,
      message: "Invalid probe URL for endpoint 'Broken'",
    });
    assert.equal(transport.requests.length, 0);
  });

  it("should not send the probe key anywhere for a stored endpoint with a hostile address", async () => {
    const transport = new FakeTransport();
    const dispatcher = new UploadDispatcher({ transport });

    const host = await dispatcher.upload(payload, makeEndpoint({ name: "Imported", nodeName: "evil.example/x?" }));
    const path = await dispatcher.upload(payload, makeEndpoint({ name: "Imported", probeId: "../../admin" }));

    assert.equal(host.message, "Invalid probe URL for endpoint 'Imported'");
    assert.equal(path.message, "Invalid probe URL for endpoint 'Imported'");
    assert.equal(transport.requests.length, 0);
  });

  it("should record an event per upload", async () => {
    const dbm = new DatabaseManager();
    dbm.open(":memory:");
    dbm.initialize();
    const events = new EventRepository(dbm.connection);
    let status = 200;
    const dispatcher = new UploadDispatcher({
      transport: new FakeTransport(() => ({ status, body: "" })),
      events,
    });

    await dispatcher.upload(payload, endpoint);
    status = 502;
    await dispatcher.upload(payload, endpoint);

    const [failed, succeeded] = events.query({ limit: 2 });
    assert.equal(failed?.event_type, "UPLOAD_FAILED");
    assert.deepEqual(JSON.parse(failed?.payload ?? "{}"), {
      endpoint_id: "ep-1",
      filename: "note_1714564800.txt",
      content_type: "text/plain",
      status: 502,
    });
    assert.equal(succeeded?.event_type, "UPLOAD_SUCCEEDED");
    dbm.close();
  });
});
