// lib/normalize.ts
import type { JsonValue } from "./types";

/**
 * Strict JSON parse; anything that isn't valid JSON comes back as the raw text.
 * No fence stripping or repair.
 */
export function normalizeResponse(raw: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}
