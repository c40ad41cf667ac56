import fs from "fs";
import path from "path";
import crypto from "crypto";
import logger from "../utils/logger";
import { comparePaths, normalizePath, relativeToPrefix } from "../utils/paths";
import { PartialListingError, TrackerError, ValidationError, errorMessage } from "../utils/errors";
import type {
  CollectedListing,
  Listing,
  ListingEntry,
  ListingStats,
  SymlinkPolicy,
} from "../models/listing.model";

export interface RemoteObject {
  key: string;
  size: number;
  etag?: string;
}

export interface ObjectLister {
  listObjects(prefix: string, signal?: AbortSignal): AsyncIterable<RemoteObject>;
}

export interface CollectOptions {
  signal?: AbortSignal;
  /** Upper bound on the whole enumeration; 0 or absent means none */
  timeoutMs?: number;
}

export interface LocalCollectOptions extends CollectOptions {
  symlinks?: SymlinkPolicy;
  checksum?: "md5" | "none";
}

/**
 * Ties the caller's signal and the timeout to one internal signal so both
 * producers can test a single flag between steps.
 */
class Interruption {
  private readonly controller = new AbortController();
  private readonly timer?: NodeJS.Timeout;
  private cause = "";

  constructor(private readonly external: AbortSignal | undefined, timeoutMs?: number) {
    if (external?.aborted) {
      this.abort("listing cancelled");
    } else {
      external?.addEventListener("abort", this.onExternalAbort, { once: true });
    }
    if (timeoutMs && timeoutMs > 0) {
      this.timer = setTimeout(() => this.abort(`listing timed out after ${timeoutMs}ms`), timeoutMs);
      this.timer.unref();
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  check(collected: number, operation: string): void {
    if (this.controller.signal.aborted) {
      throw new PartialListingError(this.cause, collected, { operation });
    }
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.external?.removeEventListener("abort", this.onExternalAbort);
  }

  private onExternalAbort = (): void => {
    this.abort("listing cancelled");
  };

  private abort(cause: string): void {
    if (this.controller.signal.aborted) return;
    this.cause = cause;
    this.controller.abort();
  }
}

function emptyStats(): ListingStats {
  return { files: 0, totalBytes: 0, skipped: [] };
}

/**
 * Records one entry. Two source names that normalize to the same path
 * would make one of them vanish from the listing, so they fail the
 * collection instead.
 */
function addEntry(
  ctx: Pick<WalkContext, "listing" | "stats" | "sources" | "operation">,
  source: string,
  relPath: string,
  entry: ListingEntry,
): void {
  const earlier = ctx.sources.get(relPath);
  if (earlier !== undefined) {
    throw new ValidationError(
      `"${earlier}" and "${source}" both normalize to "${relPath}"`,
      { operation: ctx.operation },
    );
  }
  ctx.sources.set(relPath, source);
  ctx.listing.set(relPath, entry);
  ctx.stats.files++;
  ctx.stats.totalBytes += entry.size;
}

/**
 * Only single-part uploads carry the content MD5 as their ETag; multipart
 * ETags ("<hex>-<parts>") are left out.
 */
export function etagChecksum(etag?: string): string | undefined {
  if (!etag) return undefined;
  const bare = etag.replace(/^"|"$/g, "");
  return /^[0-9a-fA-F]{32}$/.test(bare) ? `md5:${bare.toLowerCase()}` : undefined;
}

export class RemoteListingCollector {
  constructor(
    private readonly lister: ObjectLister,
    private readonly prefix: string,
  ) {}

  async collect(options: CollectOptions = {}): Promise<CollectedListing> {
    const operation = "collect-remote-listing";
    const interruption = new Interruption(options.signal, options.timeoutMs);
    const listing: Listing = new Map();
    const stats = emptyStats();
    const sources = new Map<string, string>();

    try {
      for await (const object of this.lister.listObjects(this.prefix, interruption.signal)) {
        interruption.check(listing.size, operation);

        const relPath = relativeToPrefix(object.key, this.prefix);
        if (relPath === null) {
          if (!object.key.endsWith("/")) {
            logger.warn(`Skipping object key ${object.key}`);
            stats.skipped.push(object.key);
          }
          continue;
        }

        const checksum = etagChecksum(object.etag);
        addEntry(
          { listing, stats, sources, operation },
          object.key,
          relPath,
          checksum ? { size: object.size, checksum } : { size: object.size },
        );
      }
      // the lister may stop quietly once the signal fires
      interruption.check(listing.size, operation);
    } catch (error) {
      if (error instanceof TrackerError) throw error;
      // an aborted request surfaces as the lister's own error
      interruption.check(listing.size, operation);
      throw new PartialListingError(`object listing failed: ${errorMessage(error)}`, listing.size, {
        operation,
      });
    } finally {
      interruption.dispose();
    }

    logger.info(`Collected remote listing under "${this.prefix}"`, {
      files: stats.files,
      totalBytes: stats.totalBytes,
    });
    return { listing, stats };
  }
}

export class LocalListingCollector {
  private readonly symlinks: SymlinkPolicy;
  private readonly checksum: "md5" | "none";

  constructor(
    private readonly root: string,
    options: Pick<LocalCollectOptions, "symlinks" | "checksum"> = {},
  ) {
    this.symlinks = options.symlinks ?? "follow";
    this.checksum = options.checksum ?? "none";
  }

  async collect(options: CollectOptions = {}): Promise<CollectedListing> {
    const operation = "collect-local-listing";
    const interruption = new Interruption(options.signal, options.timeoutMs);
    const listing: Listing = new Map();
    const stats = emptyStats();

    try {
      let rootReal: string;
      try {
        rootReal = await fs.promises.realpath(this.root);
        const rootStat = await fs.promises.stat(rootReal);
        if (!rootStat.isDirectory()) throw new Error("not a directory");
      } catch (error) {
        throw new ValidationError(`cannot list ${this.root}: ${errorMessage(error)}`, { operation });
      }

      await this.walk(this.root, "", new Set([rootReal]), {
        listing,
        stats,
        sources: new Map(),
        interruption,
        operation,
      });
    } finally {
      interruption.dispose();
    }

    logger.info(`Collected local listing of ${this.root}`, {
      files: stats.files,
      totalBytes: stats.totalBytes,
      skipped: stats.skipped.length,
    });
    return { listing, stats };
  }

  private async walk(
    dir: string,
    relDir: string,
    ancestors: Set<string>,
    ctx: WalkContext,
  ): Promise<void> {
    ctx.interruption.check(ctx.listing.size, ctx.operation);

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      throw new PartialListingError(`cannot read ${dir}: ${errorMessage(error)}`, ctx.listing.size, {
        operation: ctx.operation,
      });
    }
    entries.sort((x, y) => comparePaths(x.name, y.name));

    for (const entry of entries) {
      ctx.interruption.check(ctx.listing.size, ctx.operation);
      const fullPath = path.join(dir, entry.name);
      const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;

      if (entry.isSymbolicLink()) {
        if (this.symlinks === "skip") {
          logger.debug(`Skipping symlink ${relPath}`);
          continue;
        }

        let target: fs.Stats;
        try {
          target = await fs.promises.stat(fullPath);
        } catch (error) {
          logger.warn(`Skipping dangling symlink ${relPath}`, { error: errorMessage(error) });
          ctx.stats.skipped.push(relPath);
          continue;
        }

        if (target.isDirectory()) {
          await this.descend(fullPath, relPath, ancestors, ctx);
        } else if (target.isFile()) {
          await this.addFile(fullPath, relPath, target.size, ctx);
        }
      } else if (entry.isDirectory()) {
        await this.descend(fullPath, relPath, ancestors, ctx);
      } else if (entry.isFile()) {
        const fileStat = await this.statOrFail(fullPath, ctx);
        await this.addFile(fullPath, relPath, fileStat.size, ctx);
      }
    }
  }

  private async descend(
    fullPath: string,
    relPath: string,
    ancestors: Set<string>,
    ctx: WalkContext,
  ): Promise<void> {
    let real: string;
    try {
      real = await fs.promises.realpath(fullPath);
    } catch (error) {
      throw new PartialListingError(`cannot resolve ${fullPath}: ${errorMessage(error)}`, ctx.listing.size, {
        operation: ctx.operation,
      });
    }
    if (ancestors.has(real)) {
      logger.warn(`Not re-entering ${relPath}: directory cycle`);
      ctx.stats.skipped.push(relPath);
      return;
    }
    await this.walk(fullPath, relPath, new Set([...ancestors, real]), ctx);
  }

  private async addFile(
    fullPath: string,
    relPath: string,
    size: number,
    ctx: WalkContext,
  ): Promise<void> {
    const normalized = normalizePath(relPath);
    if (normalized === null) {
      logger.warn(`Skipping file with unusable name ${JSON.stringify(relPath)}`);
      ctx.stats.skipped.push(relPath);
      return;
    }

    const entry: ListingEntry = { size };
    if (this.checksum === "md5") {
      try {
        entry.checksum = `md5:${await md5File(fullPath, ctx.interruption.signal)}`;
      } catch (error) {
        ctx.interruption.check(ctx.listing.size, ctx.operation);
        throw new PartialListingError(`cannot read ${fullPath}: ${errorMessage(error)}`, ctx.listing.size, {
          operation: ctx.operation,
        });
      }
    }
    addEntry(ctx, relPath, normalized, entry);
  }

  private async statOrFail(fullPath: string, ctx: WalkContext): Promise<fs.Stats> {
    try {
      return await fs.promises.stat(fullPath);
    } catch (error) {
      throw new PartialListingError(`cannot stat ${fullPath}: ${errorMessage(error)}`, ctx.listing.size, {
        operation: ctx.operation,
      });
    }
  }
}

interface WalkContext {
  listing: Listing;
  stats: ListingStats;
  /** Normalized path to the name it was collected under */
  sources: Map<string, string>;
  interruption: Interruption;
  operation: string;
}

function md5File(filePath: string, signal: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash("md5");
    const stream = fs.createReadStream(filePath, { signal });
    stream.on("data", (chunk) => hash.update(chunk));
    stream.on("end", () => resolve(hash.digest("hex")));
    stream.on("error", reject);
  });
}

/** Sorted `path\tsize\tchecksum` lines with a trailing newline. */
export function formatListing(listing: Listing): string {
  const lines = [...listing.keys()].sort(comparePaths).map((relPath) => {
    const entry = listing.get(relPath);
    return `${relPath}\t${entry?.size ?? 0}\t${entry?.checksum ?? "-"}`;
  });
  return lines.length ? `${lines.join("\n")}\n` : "";
}

export function parseListing(text: string, source = "listing"): Listing {
  const operation = "read-listing";
  const listing: Listing = new Map();

  text.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === "") return;
    const lineNo = index + 1;
    const fields = line.split("\t");
    if (fields.length !== 3) {
      throw new ValidationError(`${source} line ${lineNo}: expected 3 tab-separated fields`, {
        operation,
      });
    }

    const [rawPath, rawSize, rawChecksum] = fields;
    const relPath = normalizePath(rawPath);
    if (relPath === null) {
      throw new ValidationError(`${source} line ${lineNo}: unusable path "${rawPath}"`, { operation });
    }
    if (!/^\d+$/.test(rawSize) || !Number.isSafeInteger(Number(rawSize))) {
      throw new ValidationError(`${source} line ${lineNo}: invalid size "${rawSize}"`, { operation });
    }
    if (listing.has(relPath)) {
      throw new ValidationError(`${source} line ${lineNo}: duplicate path "${relPath}"`, { operation });
    }

    const entry: ListingEntry = { size: Number(rawSize) };
    if (rawChecksum !== "-" && rawChecksum !== "") entry.checksum = rawChecksum;
    listing.set(relPath, entry);
  });

  return listing;
}

/** Writes to a sibling temp file first so readers never see half a listing. */
export async function writeListing(filePath: string, listing: Listing): Promise<void> {
  await fs.promises.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.promises.writeFile(tmpPath, formatListing(listing), "utf8");
    await fs.promises.rename(tmpPath, filePath);
  } catch (error) {
    await fs.promises.rm(tmpPath, { force: true });
    throw error;
  }
  logger.debug(`Wrote listing ${filePath}`, { entries: listing.size });
}

export async function readListing(filePath: string): Promise<Listing> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, "utf8");
  } catch (error) {
    throw new ValidationError(`cannot read listing ${filePath}: ${errorMessage(error)}`, {
      operation: "read-listing",
    });
  }
  return parseListing(text, filePath);
}
