/**
 * Normalizes a file path to the relative form shared by manifests,
 * remote listings and local listings.
 * Rules:
 * - Backslashes become forward slashes
 * - Leading "/" and "./" are stripped, repeated slashes collapse
 * - "." segments are dropped
 * - Unicode NFC, case preserved
 * Returns null for paths that cannot be made relative: empty, containing
 * a ".." segment, or containing tab / CR / LF (the listing file format
 * reserves those).
 */
export function normalizePath(input: string): string | null {
  if (/[\t\r\n]/.test(input)) return null;

  const segments = input
    .normalize("NFC")
    .replace(/\\/g, "/")
    .split("/")
    .filter((segment) => segment !== "" && segment !== ".");

  if (segments.length === 0) return null;
  if (segments.includes("..")) return null;

  return segments.join("/");
}

/**
 * Strips an object-store prefix from a key and normalizes the remainder.
 * Keys outside the prefix, and directory markers, yield null.
 */
export function relativeToPrefix(key: string, prefix: string): string | null {
  if (key.endsWith("/")) return null;

  const cleanPrefix = normalizePrefix(prefix);
  const cleanKey = key.replace(/^\/+/, "");
  if (cleanPrefix && !cleanKey.startsWith(cleanPrefix)) return null;

  return normalizePath(cleanKey.slice(cleanPrefix.length));
}

/** "qr2" and "/qr2/" both become "qr2/"; an empty prefix stays empty. */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.replace(/^\/+|\/+$/g, "");
  return trimmed ? `${trimmed}/` : "";
}

export function objectKeyFor(prefix: string, path: string): string {
  return `${normalizePrefix(prefix)}${path}`;
}

/** Code-unit order, independent of the process locale. */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
