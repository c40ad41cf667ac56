import Joi from "joi";
import logger from "../utils/logger";
import { normalizePath } from "../utils/paths";
import {
  ConflictError,
  DuplicateLoadError,
  NotFoundError,
  ValidationError,
} from "../utils/errors";
import type { DBService, Page, PageCursor } from "./db.service";
import {
  LOAD_ID_MAX_LENGTH,
  LOAD_ID_PATTERN,
  type FileEntry,
  type Manifest,
  type ManifestFilter,
  type ManifestSummary,
  type OverwritePolicy,
} from "../models/manifest.model";
import type { Listing } from "../models/listing.model";

export interface FileEntryInput {
  path: string;
  size: number;
  checksum?: string;
}

const loadIdSchema = Joi.string()
  .max(LOAD_ID_MAX_LENGTH)
  .pattern(LOAD_ID_PATTERN)
  .required();

const entriesSchema = Joi.array<FileEntryInput[]>()
  .items(
    Joi.object({
      path: Joi.string().required(),
      size: Joi.number().integer().positive().required(),
      // "-" marks an absent checksum in listing files
      checksum: Joi.string().pattern(/^\S+$/).invalid("-").optional(),
    }),
  )
  .min(1)
  .required();

export function validateLoadId(loadId: string, operation: string): void {
  const { error } = loadIdSchema.validate(loadId);
  if (error) {
    throw new ValidationError(`invalid load id (${error.message})`, {
      loadId,
      operation,
    });
  }
}

export interface ManifestServiceOptions {
  overwrite?: OverwritePolicy;
  pageSize?: number;
  now?: () => Date;
}

export class ManifestService {
  private readonly overwrite: OverwritePolicy;
  private readonly pageSize: number;
  private readonly now: () => Date;

  constructor(
    private readonly db: DBService,
    options: ManifestServiceOptions = {},
  ) {
    this.overwrite = options.overwrite ?? "reject";
    this.pageSize = options.pageSize ?? 100;
    this.now = options.now ?? (() => new Date());
  }

  async create(loadId: string, input: FileEntryInput[]): Promise<Manifest> {
    const operation = "create-manifest";
    validateLoadId(loadId, operation);

    const entries = this.normalizeEntries(loadId, input);
    const manifest: Manifest = {
      loadId,
      entries,
      fileCount: entries.length,
      totalBytes: entries.reduce((sum, entry) => sum + entry.size, 0),
      createdAt: this.now().toISOString(),
    };

    const result = await this.db.createManifest(manifest, this.overwrite);
    switch (result) {
      case "duplicate":
        throw new DuplicateLoadError("manifest already exists", { loadId, operation });
      case "active_job":
        throw new ConflictError("cannot replace manifest while its job is active", {
          loadId,
          operation,
        });
      case "replaced":
        logger.warn(`Replaced manifest for ${loadId}`, { fileCount: manifest.fileCount });
        break;
      case "created":
        logger.info(`Created manifest for ${loadId}`, {
          fileCount: manifest.fileCount,
          totalBytes: manifest.totalBytes,
        });
        break;
    }

    return manifest;
  }

  async get(loadId: string): Promise<Manifest> {
    const summary = await this.summary(loadId);
    const entries = await this.db.getManifestEntries(loadId);
    return { ...summary, entries };
  }

  async summary(loadId: string): Promise<ManifestSummary> {
    const summary = await this.db.getManifestSummary(loadId);
    if (!summary) {
      throw new NotFoundError("no manifest for load", { loadId, operation: "get-manifest" });
    }
    return summary;
  }

  /**
   * Manifests in creation order. Each call runs a fresh paged query, so
   * iterating twice yields two independent sequences.
   */
  async *list(filter: ManifestFilter = {}): AsyncGenerator<Manifest> {
    let cursor: PageCursor | null = null;
    do {
      const page: Page<ManifestSummary> = await this.db.listManifests(filter, cursor, this.pageSize);
      logger.debug("Fetched manifest page", { size: page.items.length });
      for (const summary of page.items) {
        const entries = await this.db.getManifestEntries(summary.loadId);
        yield { ...summary, entries };
      }
      cursor = page.next;
    } while (cursor);
  }

  toListing(manifest: Manifest): Listing {
    const listing: Listing = new Map();
    for (const entry of manifest.entries) {
      listing.set(
        entry.path,
        entry.checksum ? { size: entry.size, checksum: entry.checksum } : { size: entry.size },
      );
    }
    return listing;
  }

  private normalizeEntries(loadId: string, input: FileEntryInput[]): FileEntry[] {
    const operation = "create-manifest";
    const { error, value } = entriesSchema.validate(input);
    if (error) {
      throw new ValidationError(error.message, { loadId, operation });
    }

    const seen = new Map<string, number>();
    return value.map((raw, index) => {
      const path = normalizePath(raw.path);
      if (path === null) {
        throw new ValidationError(`entry ${index} has an unusable path "${raw.path}"`, {
          loadId,
          operation,
        });
      }

      const first = seen.get(path);
      if (first !== undefined) {
        throw new ValidationError(
          `duplicate path "${path}" at entries ${first} and ${index}`,
          { loadId, operation },
        );
      }
      seen.set(path, index);

      const entry: FileEntry = { path, size: raw.size };
      if (raw.checksum !== undefined) entry.checksum = raw.checksum;
      return entry;
    });
  }
}
