import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import {
  LocalListingCollector,
  RemoteListingCollector,
  etagChecksum,
  formatListing,
  parseListing,
  readListing,
  writeListing,
  type ObjectLister,
  type RemoteObject,
} from "../src/services/listing.service";
import { PartialListingError, ValidationError } from "../src/utils/errors";

const MD5_ABC = "900150983cd24fb0d6963f7d28e17f72";

function lister(objects: RemoteObject[], failAfter?: number): ObjectLister {
  return {
    async *listObjects() {
      let yielded = 0;
      for (const object of objects) {
        if (failAfter !== undefined && yielded === failAfter) {
          throw new Error("connection reset");
        }
        yield object;
        yielded++;
      }
    },
  };
}

describe("LocalListingCollector", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "listing-"));
    fs.writeFileSync(path.join(root, "a.fits"), "abc");
    fs.mkdirSync(path.join(root, "sub"));
    fs.writeFileSync(path.join(root, "sub", "b.fits"), "12345");
    fs.symlinkSync(path.join(root, "a.fits"), path.join(root, "link.fits"));
    fs.symlinkSync(root, path.join(root, "loop"));
    fs.symlinkSync(path.join(root, "missing.fits"), path.join(root, "dead"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("follows links, skips dangling ones and does not loop", async () => {
    const { listing, stats } = await new LocalListingCollector(root).collect();

    expect([...listing.entries()]).toEqual([
      ["a.fits", { size: 3 }],
      ["link.fits", { size: 3 }],
      ["sub/b.fits", { size: 5 }],
    ]);
    expect(stats).toEqual({ files: 3, totalBytes: 11, skipped: ["dead", "loop"] });
  });

  it("leaves links out under the skip policy", async () => {
    const { listing, stats } = await new LocalListingCollector(root, {
      symlinks: "skip",
    }).collect();

    expect([...listing.keys()]).toEqual(["a.fits", "sub/b.fits"]);
    expect(stats.skipped).toEqual([]);
  });

  it("computes md5 checksums on request", async () => {
    const { listing } = await new LocalListingCollector(root, {
      symlinks: "skip",
      checksum: "md5",
    }).collect();

    expect(listing.get("a.fits")).toEqual({ size: 3, checksum: `md5:${MD5_ABC}` });
  });

  it("stops with a partial-listing error when aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    const error = await new LocalListingCollector(root)
      .collect({ signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PartialListingError);
    expect(error).toMatchObject({
      message: "collect-local-listing: listing cancelled after 0 entries",
      collected: 0,
      retryable: true,
    });
  });

  it("fails when two file names normalize to the same path", async () => {
    fs.mkdirSync(path.join(root, "x"));
    fs.writeFileSync(path.join(root, "x", "y.fits"), "ab");
    fs.writeFileSync(path.join(root, "x\\y.fits"), "a");

    const error = await new LocalListingCollector(root, { symlinks: "skip" })
      .collect()
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      message: 'collect-local-listing: "x/y.fits" and "x\\y.fits" both normalize to "x/y.fits"',
    });
  });

  it("reports a directory that cannot be resolved as a partial listing", async () => {
    const realpath = fs.promises.realpath;
    vi.spyOn(fs.promises, "realpath")
      .mockImplementationOnce(realpath)
      .mockRejectedValueOnce(new Error("ENOENT: no such file or directory"));

    const error = await new LocalListingCollector(root, { symlinks: "skip" })
      .collect()
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PartialListingError);
    expect(error).toMatchObject({
      message: `collect-local-listing: cannot resolve ${path.join(root, "sub")}: ENOENT: no such file or directory after 1 entries`,
      collected: 1,
    });
  });

  it("rejects a root that is not a directory", async () => {
    await expect(
      new LocalListingCollector(path.join(root, "a.fits")).collect(),
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      new LocalListingCollector(path.join(root, "nowhere")).collect(),
    ).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("RemoteListingCollector", () => {
  it("strips the prefix and keeps single-part md5 etags", async () => {
    const objects: RemoteObject[] = [
      { key: "qr2/a.fits", size: 3, etag: `"${MD5_ABC}"` },
      { key: "qr2/level2/", size: 0 },
      { key: "qr2/level2/big.fits", size: 5000, etag: '"9b2cf535f27731c974343645a3985328-3"' },
      { key: "qr1/stray.fits", size: 1 },
    ];

    const { listing, stats } = await new RemoteListingCollector(lister(objects), "qr2").collect();

    expect([...listing.entries()]).toEqual([
      ["a.fits", { size: 3, checksum: `md5:${MD5_ABC}` }],
      ["level2/big.fits", { size: 5000 }],
    ]);
    expect(stats).toEqual({ files: 2, totalBytes: 5003, skipped: ["qr1/stray.fits"] });
  });

  it("turns an enumeration failure into a partial-listing error", async () => {
    const objects: RemoteObject[] = [
      { key: "qr2/a.fits", size: 3 },
      { key: "qr2/b.fits", size: 4 },
    ];

    await expect(
      new RemoteListingCollector(lister(objects, 1), "qr2").collect(),
    ).rejects.toThrow(
      "collect-remote-listing: object listing failed: connection reset after 1 entries",
    );
  });

  it("fails when two keys normalize to the same path", async () => {
    const objects: RemoteObject[] = [
      { key: "qr2/a.fits", size: 10 },
      { key: "qr2//a.fits", size: 20 },
    ];

    const error = await new RemoteListingCollector(lister(objects), "qr2")
      .collect()
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      message: 'collect-remote-listing: "qr2/a.fits" and "qr2//a.fits" both normalize to "a.fits"',
    });
  });

  it("stops when the caller aborts mid-listing", async () => {
    const controller = new AbortController();
    const aborting: ObjectLister = {
      async *listObjects() {
        yield { key: "a.fits", size: 1 };
        controller.abort();
        yield { key: "b.fits", size: 2 };
      },
    };

    const error = await new RemoteListingCollector(aborting, "")
      .collect({ signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PartialListingError);
    expect(error).toMatchObject({ collected: 1 });
  });

  it("stops when the lister gives up quietly after an abort", async () => {
    const controller = new AbortController();
    const quiet: ObjectLister = {
      async *listObjects(_prefix, signal) {
        yield { key: "a.fits", size: 1 };
        controller.abort();
        if (signal?.aborted) return;
        yield { key: "b.fits", size: 2 };
      },
    };

    await expect(
      new RemoteListingCollector(quiet, "").collect({ signal: controller.signal }),
    ).rejects.toBeInstanceOf(PartialListingError);
  });
});

describe("etagChecksum", () => {
  it("accepts only plain md5 etags", () => {
    expect(etagChecksum(`"${MD5_ABC.toUpperCase()}"`)).toBe(`md5:${MD5_ABC}`);
    expect(etagChecksum('"9b2cf535f27731c974343645a3985328-3"')).toBeUndefined();
    expect(etagChecksum(undefined)).toBeUndefined();
  });
});

describe("listing files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "listing-file-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes sorted tab-separated lines and reads them back", async () => {
    const file = path.join(dir, "out", "local.tsv");
    const listing = new Map([
      ["sub/b.fits", { size: 5 }],
      ["a.fits", { size: 3, checksum: `md5:${MD5_ABC}` }],
    ]);

    await writeListing(file, listing);

    expect(fs.readFileSync(file, "utf8")).toBe(`a.fits\t3\tmd5:${MD5_ABC}\nsub/b.fits\t5\t-\n`);
    expect(fs.readdirSync(path.dirname(file))).toEqual(["local.tsv"]);
    expect(await readListing(file)).toEqual(listing);
  });

  it("writes an empty listing as an empty file", () => {
    expect(formatListing(new Map())).toBe("");
    expect(parseListing("").size).toBe(0);
  });

  it("ignores blank lines", () => {
    const listing = parseListing("a.fits\t1\t-\r\n\n#1.fits\t2\t-\n");
    expect([...listing.keys()]).toEqual(["a.fits", "#1.fits"]);
  });

  it.each([
    ["a.fits\t1\n", "local.tsv line 1: expected 3 tab-separated fields"],
    ["a.fits\t1\t-\nb.fits\tbig\t-\n", 'local.tsv line 2: invalid size "big"'],
    ["a.fits\t9007199254740993\t-\n", 'local.tsv line 1: invalid size "9007199254740993"'],
    ["../a.fits\t1\t-\n", 'local.tsv line 1: unusable path "../a.fits"'],
    ["a.fits\t1\t-\n./a.fits\t1\t-\n", 'local.tsv line 2: duplicate path "a.fits"'],
  ])("rejects %j", (text, message) => {
    expect(() => parseListing(text, "local.tsv")).toThrow(`read-listing: ${message}`);
  });

  it("reports an unreadable file as a validation error", async () => {
    await expect(readListing(path.join(dir, "absent.tsv"))).rejects.toBeInstanceOf(
      ValidationError,
    );
  });
});
