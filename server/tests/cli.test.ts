import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { main, type CliIO } from "../src/cli";
import { L1_ENTRIES } from "./helpers";

class CapturedIO implements CliIO {
  stdout: string[] = [];
  stderr: string[] = [];

  out(line: string): void {
    this.stdout.push(line);
  }

  err(line: string): void {
    this.stderr.push(line);
  }
}

describe("upload-tracker CLI", () => {
  let dir: string;
  let env: NodeJS.ProcessEnv;
  let io: CapturedIO;

  const run = (...argv: string[]) => main(argv, io, env);

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tracker-cli-"));
    env = { DB_PATH: path.join(dir, "tracker.db") };
    io = new CapturedIO();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function file(name: string, text: string): string {
    const target = path.join(dir, name);
    fs.writeFileSync(target, text);
    return target;
  }

  it("prints help without a command", async () => {
    expect(await run()).toBe(0);
    expect(io.stdout[0]).toMatch(/^upload-tracker <command> \[args\]/);
  });

  it("fails on an unknown command", async () => {
    expect(await run("frobnicate")).toBe(1);
    expect(io.stdout[0]).toContain("compare-listings");
  });

  describe("compare-listings", () => {
    it("prints the reconciliation report", async () => {
      const local = file("local.tsv", "a.fits\t100\t-\nb.fits\t250\t-\n");
      const remote = file("remote.tsv", "a.fits\t100\t-\nb.fits\t200\t-\nc.fits\t5\t-\n");

      expect(await run("compare-listings", local, remote)).toBe(0);
      expect(io.stdout).toEqual([
        [
          "total: 3",
          "MATCH: 1",
          "SIZE_MISMATCH: 1",
          "CHECKSUM_MISMATCH: 0",
          "MISSING_REMOTE: 1",
          "MISSING_LOCAL: 0",
          "",
          "MATCH\ta.fits\t100\t100",
          "SIZE_MISMATCH\tb.fits\t250\t200",
          "MISSING_REMOTE\tc.fits\t-\t5",
        ].join("\n"),
      ]);
    });

    it("treats the first listing as expected on request", async () => {
      const local = file("local.tsv", "a.fits\t1\t-\n");
      const remote = file("remote.tsv", "");
      const out = path.join(dir, "reports", "diff.txt");

      expect(await run("compare-listings", local, remote, "--expected", "a", "--out", out)).toBe(0);
      expect(io.stdout).toEqual([]);
      expect(fs.readFileSync(out, "utf8")).toContain("MISSING_REMOTE\ta.fits\t1\t-\n");
    });

    it("exits with the validation code for an unreadable listing", async () => {
      const local = file("local.tsv", "");

      expect(await run("compare-listings", local, path.join(dir, "absent.tsv"))).toBe(2);
      expect(io.stderr[0]).toMatch(/^Error \[validation\]: read-listing: cannot read listing /);
    });

    it("exits with the validation code on bad usage", async () => {
      expect(await run("compare-listings", "only-one.tsv")).toBe(2);
      expect(io.stderr).toEqual([
        "Usage: upload-tracker compare-listings <a> <b> [--expected a|b] [--out <file>]",
      ]);
    });
  });

  it("writes a local listing", async () => {
    const root = path.join(dir, "staging");
    fs.mkdirSync(path.join(root, "sub"), { recursive: true });
    fs.writeFileSync(path.join(root, "a.fits"), "abc");
    fs.writeFileSync(path.join(root, "sub", "b.fits"), "12345");
    const output = path.join(dir, "local.tsv");

    expect(await run("collect-local-listing", root, output)).toBe(0);
    expect(io.stdout).toEqual([`2 files, 8 bytes written to ${output}`]);
    expect(fs.readFileSync(output, "utf8")).toBe("a.fits\t3\t-\nsub/b.fits\t5\t-\n");
  });

  it("tracks a load through manifests and jobs", async () => {
    const entries = file("entries.json", JSON.stringify(L1_ENTRIES));

    expect(await run("create-manifest", "L1", entries)).toBe(0);
    expect(io.stdout[0]).toMatch(/^L1\t3\t650\t650\.0B\t\d{4}-\d{2}-\d{2}T/);

    expect(await run("create-manifest", "L1", entries)).toBe(5);
    expect(io.stderr[0]).toMatch(/^Error \[conflict\]: create-manifest L1: /);

    expect(await run("create-job", "L1")).toBe(0);
    expect(io.stdout[1]).toMatch(/^L1\t[0-9a-f-]{36}\t1\tPENDING\t/);

    expect(await run("report-job", "L1")).toBe(0);
    expect(io.stdout[2]).toContain("\nstatus: PENDING\n");
    expect(io.stdout[2]).toContain("\nstarted_at: -\n");

    expect(await run("complete-job", "L1", "--success")).toBe(4);
    expect(await run("cancel-job", "L1")).toBe(0);
    expect(await run("cancel-job", "L1")).toBe(4);

    expect(await run("job-entries", "L1")).toBe(0);
    expect(io.stdout).toHaveLength(4);

    expect(await run("report-job", "nope")).toBe(3);
    expect(io.stderr[io.stderr.length - 1]).toBe(
      "Error [not_found]: report-job nope: no job for load",
    );
  });

  it("needs a positive --count for run-job", async () => {
    expect(await run("run-job", "L1", "--count", "0")).toBe(2);
    expect(await run("run-job", "L1", "--count", "--mock")).toBe(2);
    expect(io.stderr).toEqual([
      "--count needs a positive integer, got 0",
      "Usage: upload-tracker run-job <load-id> [--count <n>] [--mock]",
    ]);
  });

  it("creates a manifest from a listing file", async () => {
    const listing = file("local.tsv", "a.fits\t3\t-\nsub/b.fits\t5\tmd5:0cc175b9c0f1b6a831c399e269772661\n");

    expect(await run("create-manifest", "L2", listing)).toBe(0);
    expect(io.stdout[0]).toMatch(/^L2\t2\t8\t8\.0B\t/);
  });

  it("rejects an entries file that is not an array", async () => {
    const entries = file("entries.json", JSON.stringify({ path: "a.fits" }));

    expect(await run("create-manifest", "L1", entries)).toBe(2);
  });

  it("needs exactly one of --success and --failed", async () => {
    expect(await run("complete-job", "L1")).toBe(2);
    expect(await run("complete-job", "L1", "--success", "--failed")).toBe(2);
  });

  it("needs a positive age for expire-jobs", async () => {
    expect(await run("expire-jobs")).toBe(2);
    expect(await run("expire-jobs", "--older-than-sec", "3600")).toBe(0);
    expect(io.stdout).toEqual([]);
  });
});
