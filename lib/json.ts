// lib/json.ts
import type { JsonValue } from "./types";

export function isJsonValue(value: unknown): value is JsonValue {
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (value === null) return true;
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

// Request bodies arrive through JSON.parse, so this only rejects what JSON can't carry.
export function optionalJson(value: unknown): JsonValue | undefined {
  return isJsonValue(value) ? value : undefined;
}
