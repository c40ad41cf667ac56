import { comparePaths } from "../utils/paths";
import type {
  DiscrepancyRecord,
  DiscrepancyStatus,
  Listing,
  ListingEntry,
  ReconciliationReport,
} from "../models/listing.model";

export type ListingSide = "a" | "b";

export interface CompareOptions {
  /**
   * The side holding the local (expected) file set. A path found only
   * there is MISSING_REMOTE; a path found only on the other side is
   * MISSING_LOCAL.
   */
  expected?: ListingSide;
}

/**
 * Classifies every path of `a` ∪ `b`. Pure: no I/O, no shared state.
 */
export function compare(
  a: Listing,
  b: Listing,
  options: CompareOptions = {},
): ReconciliationReport {
  const expected = options.expected ?? "b";
  const paths = new Set<string>([...a.keys(), ...b.keys()]);

  const records: DiscrepancyRecord[] = [];
  for (const path of [...paths].sort(comparePaths)) {
    const left = a.get(path);
    const right = b.get(path);
    const record: DiscrepancyRecord = { path, status: classify(left, right, expected) };
    if (left) record.a = left;
    if (right) record.b = right;
    records.push(record);
  }

  return { records, counts: countStatuses(records), total: records.length };
}

function classify(
  left: ListingEntry | undefined,
  right: ListingEntry | undefined,
  expected: ListingSide,
): DiscrepancyStatus {
  if (left && right) {
    if (left.size !== right.size) return "SIZE_MISMATCH";
    if (checksumsDiffer(left.checksum, right.checksum)) return "CHECKSUM_MISMATCH";
    return "MATCH";
  }

  const presentOn: ListingSide = left ? "a" : "b";
  return presentOn === expected ? "MISSING_REMOTE" : "MISSING_LOCAL";
}

/**
 * Only checksums of the same algorithm are compared; anything else
 * (one side missing, md5 against sha256) cannot prove a mismatch.
 */
export function checksumsDiffer(left?: string, right?: string): boolean {
  if (left === undefined || right === undefined) return false;
  if (checksumAlgorithm(left) !== checksumAlgorithm(right)) return false;
  return left.toLowerCase() !== right.toLowerCase();
}

export function checksumAlgorithm(checksum: string): string {
  const separator = checksum.indexOf(":");
  return separator > 0 ? checksum.slice(0, separator).toLowerCase() : "";
}

function countStatuses(records: DiscrepancyRecord[]): Record<DiscrepancyStatus, number> {
  const counts: Record<DiscrepancyStatus, number> = {
    MATCH: 0,
    SIZE_MISMATCH: 0,
    CHECKSUM_MISMATCH: 0,
    MISSING_REMOTE: 0,
    MISSING_LOCAL: 0,
  };
  for (const record of records) {
    counts[record.status]++;
  }
  return counts;
}

/** True when nothing but MATCH records were found. */
export function isInSync(report: ReconciliationReport): boolean {
  return report.counts.MATCH === report.total;
}
