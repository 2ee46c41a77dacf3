import { afterEach, describe, it, expect, vi } from "vitest";
import { encodeBatchEvent, parseBatchEventLines, type BatchEvent } from "./batchStream";

afterEach(() => {
  vi.restoreAllMocks();
});

const progress: BatchEvent = {
  type: "progress",
  progress: { completed: 1, index: 1, total: 2, fraction: 0.5, company: "Acme" },
};
const done: BatchEvent = {
  type: "done",
  output: { generated_at: "2026-01-01T00:00:00.000Z", total_companies: 0, results: [] },
};

describe("encodeBatchEvent", () => {
  it("writes one JSON line", () => {
    expect(encodeBatchEvent({ type: "error", error: "boom" })).toBe(
      '{"type":"error","error":"boom"}\n'
    );
  });
});

describe("parseBatchEventLines", () => {
  it("returns complete events and keeps the partial tail", () => {
    const text = encodeBatchEvent(progress) + encodeBatchEvent(done);
    const cut = text.length - 5;

    const first = parseBatchEventLines(text.slice(0, cut));
    expect(first.events).toEqual([progress]);

    const second = parseBatchEventLines(first.rest + text.slice(cut));
    expect(second.events).toEqual([done]);
    expect(second.rest).toBe("");
  });

  it("skips blank lines and unknown events", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { events } = parseBatchEventLines('\n{"type":"mystery"}\n' + encodeBatchEvent(done));

    expect(events).toEqual([done]);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
