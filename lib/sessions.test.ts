import { describe, it, expect } from "vitest";
import type { ConfigProvider } from "./config";
import {
  base64UrlDecode,
  base64UrlEncode,
  createSessionId,
  createSessionState,
  decodeSessionId,
  loadSession,
  SessionStore,
  withBatchOutput,
  withConfig,
  withSingleResult,
  withValidationResult,
} from "./sessions";

describe("base64url", () => {
  it("round-trips text with url-unsafe base64 characters", () => {
    const text = "subjects?>>";
    const encoded = base64UrlEncode(text);
    expect(encoded).not.toMatch(/[+/=]/);
    expect(base64UrlDecode(encoded)).toBe(text);
  });
});

describe("session ids", () => {
  it("decodes what it issued", () => {
    const id = createSessionId("analyst", 1700000000000);
    expect(decodeSessionId(id)).toEqual({ username: "analyst", issuedAt: 1700000000000 });
  });

  it("rejects ids it did not issue", () => {
    expect(decodeSessionId("not-a-session")).toBeNull();
    expect(decodeSessionId(base64UrlEncode(JSON.stringify({ username: "" , issuedAt: 1 })))).toBeNull();
    expect(decodeSessionId(base64UrlEncode(JSON.stringify({ username: "analyst" })))).toBeNull();
  });
});

describe("session state", () => {
  const result = { company: "Acme", analysis: "ok", timestamp: "2026-01-01T00:00:00.000Z" };
  const output = { generated_at: "2026-01-01T00:00:00.000Z", total_companies: 1, results: [result] };

  it("starts empty", () => {
    expect(createSessionState("analyst", {}, "empty")).toEqual({
      username: "analyst",
      config: {},
      configSource: "empty",
      lastResult: null,
      batchOutput: null,
      validationResult: null,
    });
  });

  it("replaces one field per transition and leaves the input untouched", () => {
    const initial = createSessionState("analyst", { OPENAI_MODEL: "gpt-4o" }, "user");

    const s1 = withSingleResult(initial, result);
    const s2 = withBatchOutput(s1, output);
    const s3 = withValidationResult(s2, { overall_assessment: "fine" });
    const s4 = withConfig(s3, { OPENAI_API_KEY: "test-secret" });

    expect(initial.lastResult).toBeNull();
    expect(s1.lastResult).toBe(result);
    expect(s2.batchOutput).toBe(output);
    expect(s2.lastResult).toBe(result);
    expect(s3.validationResult).toEqual({ overall_assessment: "fine" });
    expect(s4.config).toEqual({ OPENAI_API_KEY: "test-secret" });
    expect(s4.configSource).toBe("user");
    expect(s4.batchOutput).toBe(output);
  });
});

describe("SessionStore.update", () => {
  const output = { generated_at: "2026-01-01T00:00:00.000Z", total_companies: 0, results: [] };

  it("applies the transition to the current state, not an earlier snapshot", () => {
    const store = new SessionStore();
    const snapshot = store.put("sid-1", createSessionState("analyst", {}, "empty"));
    store.put("sid-1", withConfig(snapshot, { OPENAI_API_KEY: "test-secret" }));

    const next = store.update("sid-1", (s) => withBatchOutput(s, output));

    expect(next?.config).toEqual({ OPENAI_API_KEY: "test-secret" });
    expect(next?.batchOutput).toBe(output);
    expect(store.get("sid-1")).toBe(next);
  });

  it("does not bring back a removed session", () => {
    const store = new SessionStore();
    store.put("sid-1", createSessionState("analyst", {}, "empty"));
    store.delete("sid-1");

    expect(store.update("sid-1", (s) => withBatchOutput(s, output))).toBeUndefined();
    expect(store.get("sid-1")).toBeUndefined();
    expect(store.size).toBe(0);
  });
});

describe("loadSession", () => {
  function countingProvider(calls: { n: number }): ConfigProvider {
    return {
      name: "envFile",
      async tryResolve() {
        calls.n++;
        return { OPENAI_MODEL: "gpt-4o-mini" };
      },
    };
  }

  it("resolves configuration once per session", async () => {
    const store = new SessionStore();
    const calls = { n: 0 };

    const first = await loadSession(store, "sid-1", "analyst", [countingProvider(calls)]);
    const second = await loadSession(store, "sid-1", "analyst", [countingProvider(calls)]);

    expect(first.config).toEqual({ OPENAI_MODEL: "gpt-4o-mini" });
    expect(first.configSource).toBe("envFile");
    expect(second).toBe(first);
    expect(calls.n).toBe(1);
    expect(store.size).toBe(1);
  });

  it("keeps sessions apart", async () => {
    const store = new SessionStore();
    const calls = { n: 0 };

    const a = await loadSession(store, "sid-a", "analyst", [countingProvider(calls)]);
    store.put("sid-a", withConfig(a, {}));
    const b = await loadSession(store, "sid-b", "reviewer", [countingProvider(calls)]);

    expect(store.get("sid-a")?.config).toEqual({});
    expect(b.config).toEqual({ OPENAI_MODEL: "gpt-4o-mini" });

    store.delete("sid-a");
    expect(store.get("sid-a")).toBeUndefined();
    expect(store.size).toBe(1);
  });
});
