// lib/batchStream.ts
import type { BatchOutput, BatchProgress } from "./types";

// NDJSON events for POST /api/batch: progress lines, then exactly one done or error line.
export type BatchEvent =
  | { type: "progress"; progress: BatchProgress }
  | { type: "done"; output: BatchOutput }
  | { type: "error"; error: string; kind?: string };

export function encodeBatchEvent(event: BatchEvent): string {
  return `${JSON.stringify(event)}\n`;
}

function isBatchEvent(value: unknown): value is BatchEvent {
  if (typeof value !== "object" || value === null || !("type" in value)) return false;
  switch (value.type) {
    case "progress":
      return "progress" in value && typeof value.progress === "object";
    case "done":
      return "output" in value && typeof value.output === "object";
    case "error":
      return "error" in value && typeof value.error === "string";
    default:
      return false;
  }
}

/**
 * Split a chunk of streamed text into complete events. Returns the
 * trailing partial line so the caller can prepend it to the next chunk.
 */
export function parseBatchEventLines(buffer: string): {
  events: BatchEvent[];
  rest: string;
} {
  const lines = buffer.split("\n");
  const rest = lines.pop() ?? "";
  const events: BatchEvent[] = [];

  for (const line of lines) {
    if (!line.trim()) continue;
    const parsed: unknown = JSON.parse(line);
    if (isBatchEvent(parsed)) {
      events.push(parsed);
    } else {
      console.warn("[Batch] Ignoring unknown stream event:", line.slice(0, 200));
    }
  }

  return { events, rest };
}
