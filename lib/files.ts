// lib/files.ts

const pad = (n: number) => String(n).padStart(2, "0");

/**
 * `<prefix>_YYYYMMDD_HHMMSS.json` in local time.
 */
export function timestampedFileName(prefix: string, date: Date = new Date()): string {
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${prefix}_${stamp}.json`;
}

export function toJsonText(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
