export const LOAD_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
export const LOAD_ID_MAX_LENGTH = 200;

export interface FileEntry {
  /** Normalized path relative to the staging root */
  path: string;
  size: number;
  /** Conventionally "<algorithm>:<hex>", e.g. "md5:9e107d9d..." */
  checksum?: string;
}

export interface Manifest {
  loadId: string;
  entries: FileEntry[];
  fileCount: number;
  totalBytes: number;
  createdAt: string;
}

export type ManifestSummary = Omit<Manifest, "entries">;

export interface ManifestFilter {
  loadId?: string;
  prefix?: string;
}

export type OverwritePolicy = "reject" | "replace";
