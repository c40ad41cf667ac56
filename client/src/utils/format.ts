const SIZE_UNITS = ["B", "KiB", "MiB", "GiB", "TiB"];

export function humanReadableSize(sizeBytes: number): string {
  if (sizeBytes <= 0) return "0B";

  let size = sizeBytes;
  let unit = 0;
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit++;
  }
  return `${size.toFixed(1)}${SIZE_UNITS[unit]}`;
}

/** H:MM:SS.mmm */
export function formatElapsed(ms: number): string {
  const clamped = Math.max(0, Math.round(ms));
  const hours = Math.floor(clamped / 3_600_000);
  const minutes = Math.floor((clamped % 3_600_000) / 60_000);
  const seconds = Math.floor((clamped % 60_000) / 1000);
  const millis = clamped % 1000;

  const pad = (value: number, width: number) => value.toString().padStart(width, "0");
  return `${hours}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(millis, 3)}`;
}
