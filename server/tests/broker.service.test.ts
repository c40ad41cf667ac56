import { describe, it, expect } from "vitest";
import { parseTransferEvent, requireReceivers } from "../src/services/broker.service";
import { ValidationError } from "../src/utils/errors";

describe("parseTransferEvent", () => {
  const entry = {
    event: "upload_entry",
    jobId: "job-1",
    loadId: "L1",
    path: "a.fits",
    status: "ERROR",
    size: 3,
    error: "Request failed with status code 500",
    timestamp: "2026-01-20T11:00:00.000Z",
  };

  it("reads an entry event", () => {
    expect(parseTransferEvent(JSON.stringify(entry))).toEqual(entry);
  });

  it("reads a completion event", () => {
    const complete = {
      event: "upload_complete",
      jobId: "job-1",
      loadId: "L1",
      uploadedFiles: 1,
      uploadedBytes: 3,
      timestamp: "2026-01-20T11:00:00.000Z",
    };
    expect(parseTransferEvent(JSON.stringify(complete))).toEqual(complete);
  });

  it.each([
    ["an unknown entry status", { ...entry, status: "DONE" }],
    ["a completion without counters", { ...entry, event: "upload_complete" }],
    ["text that is not JSON", "{"],
  ])("rejects %s", (_label, message) => {
    const text = typeof message === "string" ? message : JSON.stringify(message);
    expect(() => parseTransferEvent(text)).toThrow(ValidationError);
  });
});

describe("requireReceivers", () => {
  it("treats a message nobody received as undelivered", () => {
    expect(() => requireReceivers(0, "commands:uploader")).toThrow(
      "nobody is subscribed to commands:uploader",
    );
    expect(() => requireReceivers(2, "commands:uploader")).not.toThrow();
  });
});
