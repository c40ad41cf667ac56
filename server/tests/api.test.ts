import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Server } from "http";
import { createApp } from "../src/app";
import { createHarness, L1_ENTRIES, type Harness } from "./helpers";

const API_KEY = "test-secret";

describe("HTTP API", () => {
  let h: Harness;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    h = await createHarness();
    const app = createApp({ manifests: h.manifests, jobs: h.jobs, apiKey: API_KEY });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve())),
    );
    await h.close();
  });

  function call(method: string, route: string, body?: unknown, token = API_KEY) {
    const headers: Record<string, string> = { Authorization: `Bearer ${token}` };
    if (body !== undefined) headers["Content-Type"] = "application/json";
    return fetch(`${baseUrl}${route}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it("answers health checks without a key", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "healthy" });
  });

  it("requires the API key", async () => {
    const missing = await fetch(`${baseUrl}/jobs`);
    expect(missing.status).toBe(401);

    const wrong = await call("GET", "/jobs", undefined, "wrong-secret");
    expect(wrong.status).toBe(401);
    expect(await wrong.json()).toEqual({ error: "Unauthorized: invalid API key" });
  });

  it("creates, reads and lists manifests", async () => {
    const created = await call("POST", "/manifests", { loadId: "L1", entries: L1_ENTRIES });
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({
      ok: true,
      loadId: "L1",
      fileCount: 3,
      totalBytes: 650,
      createdAt: "2026-01-20T10:44:38.000Z",
    });

    const duplicate = await call("POST", "/manifests", { loadId: "L1", entries: L1_ENTRIES });
    expect(duplicate.status).toBe(409);
    expect(await duplicate.json()).toMatchObject({ kind: "conflict", loadId: "L1" });

    const fetched = await call("GET", "/manifests/L1");
    expect(fetched.status).toBe(200);
    expect(await fetched.json()).toMatchObject({ loadId: "L1", entries: L1_ENTRIES });

    const listed = await call("GET", "/manifests?limit=10");
    expect(await listed.json()).toEqual({
      manifests: [
        { loadId: "L1", fileCount: 3, totalBytes: 650, createdAt: "2026-01-20T10:44:38.000Z" },
      ],
    });
  });

  it("drives a job and renders its report", async () => {
    await h.manifests.create("L1", L1_ENTRIES);

    const created = await call("POST", "/jobs", { loadId: "L1" });
    expect(created.status).toBe(201);
    expect(await created.json()).toMatchObject({ loadId: "L1", status: "PENDING" });

    const run = await call("POST", "/jobs/L1/run");
    expect(run.status).toBe(202);
    expect(await run.json()).toMatchObject({ status: "RUNNING" });
    expect(h.dispatcher.uploads).toHaveLength(1);

    const report = await call("GET", "/jobs/L1/report?format=text");
    expect(report.status).toBe(200);
    expect(report.headers.get("content-type")).toMatch(/^text\/plain/);
    const text = await report.text();
    expect(text).toContain("status: RUNNING\n");
    expect(text).toContain("manifest_bytes: 650 (650.0B)\n");

    const cancelled = await call("POST", "/jobs/L1/cancel");
    expect(cancelled.status).toBe(200);
    const again = await call("POST", "/jobs/L1/cancel");
    expect(again.status).toBe(409);
    expect(await again.json()).toMatchObject({
      kind: "illegal_transition",
      error: "cancel-job L1: cannot move job from CANCELLED to CANCELLED",
    });
  });

  it("runs part of a load and lists its entry log", async () => {
    await h.manifests.create("L1", L1_ENTRIES);
    const job = await h.jobs.create("L1");

    const bad = await call("POST", "/jobs/L1/run", { count: 0 });
    expect(bad.status).toBe(400);
    expect(h.dispatcher.uploads).toHaveLength(0);

    const run = await call("POST", "/jobs/L1/run", { count: 1, mock: true });
    expect(run.status).toBe(202);
    expect(await run.json()).toMatchObject({
      status: "RUNNING",
      detail: "Uploading 1 of 3 files (mock)",
    });
    expect(h.dispatcher.uploads[0]).toMatchObject({
      mock: true,
      entries: [expect.objectContaining({ path: "a.fits" })],
    });

    await h.jobs.applyEvent({
      event: "upload_entry",
      jobId: job.id,
      loadId: "L1",
      path: "a.fits",
      status: "COMPLETED",
      size: 100,
      timestamp: "2026-01-20T11:00:00.000Z",
    });

    const entries = await call("GET", "/jobs/L1/entries");
    expect(entries.status).toBe(200);
    expect(await entries.json()).toEqual({
      entries: [
        {
          jobId: job.id,
          path: "a.fits",
          status: "COMPLETED",
          size: 100,
          updatedAt: "2026-01-20T11:00:00.000Z",
        },
      ],
    });
  });

  it("maps missing loads to 404", async () => {
    const res = await call("GET", "/jobs/nope");
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ kind: "not_found", retryable: false });
  });

  it("rejects malformed requests", async () => {
    const invalid = await call("POST", "/jobs", { load: "L1" });
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toMatchObject({ error: "Invalid request body", kind: "validation" });

    const badStatus = await call("GET", "/jobs?status=DONE");
    expect(badStatus.status).toBe(400);

    const notJson = await fetch(`${baseUrl}/jobs`, {
      method: "POST",
      headers: { Authorization: `Bearer ${API_KEY}`, "Content-Type": "application/json" },
      body: "{not json",
    });
    expect(notJson.status).toBe(400);
    expect(await notJson.json()).toEqual({ error: "Invalid JSON body", kind: "validation" });
  });
});
