export interface ListingEntry {
  size: number;
  checksum?: string;
}

/** path -> metadata, paths normalized with normalizePath */
export type Listing = Map<string, ListingEntry>;

export type SymlinkPolicy = "follow" | "skip";

export interface ListingStats {
  files: number;
  totalBytes: number;
  /** Paths left out on purpose, e.g. dangling links */
  skipped: string[];
}

export interface CollectedListing {
  listing: Listing;
  stats: ListingStats;
}

export const DISCREPANCY_STATUSES = [
  "MATCH",
  "SIZE_MISMATCH",
  "CHECKSUM_MISMATCH",
  "MISSING_REMOTE",
  "MISSING_LOCAL",
] as const;

export type DiscrepancyStatus = (typeof DISCREPANCY_STATUSES)[number];

export interface DiscrepancyRecord {
  path: string;
  status: DiscrepancyStatus;
  a?: ListingEntry;
  b?: ListingEntry;
}

export interface ReconciliationReport {
  records: DiscrepancyRecord[];
  counts: Record<DiscrepancyStatus, number>;
  total: number;
}
