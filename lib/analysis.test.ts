import { describe, it, expect, vi, beforeEach } from "vitest";
import { ANALYST_SYSTEM_MESSAGE, resolveCompanyName, runBatch, runSingle } from "./analysis";
import { AppError } from "./errors";
import type { ChatCompleter, ChatCompletionRequest } from "./openai";
import type { BatchProgress, Configuration } from "./types";

const CONFIG: Configuration = { OPENAI_API_KEY: "test-secret" };
const TEMPLATE = "Find handles for {company_name}.";
const FIXED_NOW = new Date("2026-02-01T10:00:00.000Z");
const now = () => FIXED_NOW;

function fakeCompleter(reply: (request: ChatCompletionRequest) => string) {
  const requests: ChatCompletionRequest[] = [];
  const complete: ChatCompleter = async (request) => {
    requests.push(request);
    return reply(request);
  };
  return { complete, requests };
}

function userContent(request: ChatCompletionRequest | undefined): string {
  return request?.messages[1]?.content ?? "";
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected the promise to reject");
}

beforeEach(() => {
  vi.restoreAllMocks();
});

describe("resolveCompanyName", () => {
  it("accepts strings and any object with a name key", () => {
    expect(resolveCompanyName("Acme")).toBe("Acme");
    expect(resolveCompanyName({ name: "Acme", industry: "Tools" })).toBe("Acme");
    expect(resolveCompanyName({ name: "" })).toBe("");
    expect(resolveCompanyName({ name: 7 })).toBe("7");
    expect(resolveCompanyName({ name: true })).toBe("true");
    expect(resolveCompanyName({ name: null })).toBe("null");
    expect(resolveCompanyName({ name: { first: "A" } })).toBe('{"first":"A"}');
    expect(resolveCompanyName({ name: ["A", 1] })).toBe('["A",1]');
  });

  it("skips every other shape", () => {
    expect(resolveCompanyName({ title: "Acme" })).toBeNull();
    expect(resolveCompanyName(42)).toBeNull();
    expect(resolveCompanyName(null)).toBeNull();
    expect(resolveCompanyName(["Acme"])).toBeNull();
  });
});

describe("runSingle", () => {
  it("returns parsed JSON for a JSON reply", async () => {
    const { complete, requests } = fakeCompleter(
      () => '{"company_name":"Acme","main_twitter_handle":"@acme"}'
    );

    const result = await runSingle({ companyName: "Acme", template: TEMPLATE, config: CONFIG, complete, now });

    expect(result).toEqual({
      company: "Acme",
      analysis: { company_name: "Acme", main_twitter_handle: "@acme" },
      timestamp: "2026-02-01T10:00:00.000Z",
    });
    expect(requests).toHaveLength(1);
    expect(requests[0]).toEqual({
      model: "gpt-3.5-turbo",
      messages: [
        { role: "system", content: ANALYST_SYSTEM_MESSAGE },
        { role: "user", content: "Find handles for Acme." },
      ],
      max_tokens: 1000,
      temperature: 0.7,
    });
  });

  it("keeps a plain-text reply as text", async () => {
    const { complete } = fakeCompleter(() => "no handle found");
    const result = await runSingle({ companyName: "Acme", template: TEMPLATE, config: CONFIG, complete, now });
    expect(result.analysis).toBe("no handle found");
  });

  it("sends the configured model parameters", async () => {
    const { complete, requests } = fakeCompleter(() => "{}");
    await runSingle({
      companyName: "Acme",
      template: TEMPLATE,
      config: { OPENAI_API_KEY: "test-secret", OPENAI_MODEL: "gpt-4o", MAX_TOKENS: "500", TEMPERATURE: "0.2" },
      complete,
      now,
    });

    expect(requests[0]?.model).toBe("gpt-4o");
    expect(requests[0]?.max_tokens).toBe(500);
    expect(requests[0]?.temperature).toBe(0.2);
  });

  it("rejects a blank company name without calling the model", async () => {
    const { complete, requests } = fakeCompleter(() => "{}");
    const err = await captureError(
      runSingle({ companyName: "   ", template: TEMPLATE, config: CONFIG, complete })
    );

    expect(err).toBeInstanceOf(AppError);
    if (err instanceof AppError) {
      expect(err.kind).toBe("validation");
      expect(err.message).toBe("Please enter a company name");
    }
    expect(requests).toHaveLength(0);
  });

  it("rejects a missing API key without calling the model", async () => {
    const { complete, requests } = fakeCompleter(() => "{}");
    await expect(
      runSingle({ companyName: "Acme", template: TEMPLATE, config: {}, complete })
    ).rejects.toThrow("Please configure your OpenAI API key in Settings");
    expect(requests).toHaveLength(0);
  });

  it("reports completion failures as remote errors", async () => {
    const complete: ChatCompleter = async () => {
      throw new Error("rate limited");
    };
    const err = await captureError(
      runSingle({ companyName: "Acme", template: TEMPLATE, config: CONFIG, complete })
    );

    expect(err).toBeInstanceOf(AppError);
    if (err instanceof AppError) {
      expect(err.kind).toBe("remote");
      expect(err.status).toBe(502);
      expect(err.message).toBe("rate limited");
    }
  });
});

describe("runBatch", () => {
  it("records a failing company and keeps going", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { complete, requests } = fakeCompleter((request) => {
      if (userContent(request).includes("for B.")) throw new Error("boom");
      return `{"company_name":"${userContent(request).slice(17, -1)}"}`;
    });
    const progress: BatchProgress[] = [];

    const output = await runBatch({
      companies: ["A", "B", "C"],
      template: TEMPLATE,
      config: CONFIG,
      complete,
      onProgress: (p) => progress.push(p),
      now,
    });

    expect(requests).toHaveLength(3);
    expect(output.total_companies).toBe(3);
    expect(output.generated_at).toBe("2026-02-01T10:00:00.000Z");
    expect(output.results.map((r) => r.company)).toEqual(["A", "B", "C"]);
    expect(output.results[0]?.analysis).toEqual({ company_name: "A" });
    expect(output.results[1]?.analysis).toBe("Error: boom");
    expect(output.results[2]?.analysis).toEqual({ company_name: "C" });
    expect(progress.map((p) => p.fraction)).toEqual([1 / 3, 2 / 3, 1]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("skips records without a usable name", async () => {
    const { complete, requests } = fakeCompleter(() => "ok");
    const progress: BatchProgress[] = [];

    const output = await runBatch({
      companies: ["A", { name: "B" }, { title: "x" }, 42, null, { name: 7 }, ["nested"]],
      template: TEMPLATE,
      config: CONFIG,
      complete,
      onProgress: (p) => progress.push(p),
      now,
    });

    expect(requests).toHaveLength(3);
    expect(output.total_companies).toBe(3);
    expect(output.results.map((r) => r.company)).toEqual(["A", "B", "7"]);
    expect(progress).toEqual([
      { completed: 1, index: 1, total: 7, fraction: 1 / 7, company: "A" },
      { completed: 2, index: 2, total: 7, fraction: 2 / 7, company: "B" },
      { completed: 3, index: 6, total: 7, fraction: 6 / 7, company: "7" },
    ]);
  });

  it("returns an empty output for an empty list", async () => {
    const { complete, requests } = fakeCompleter(() => "ok");
    const output = await runBatch({ companies: [], template: TEMPLATE, config: CONFIG, complete, now });

    expect(output).toEqual({
      generated_at: "2026-02-01T10:00:00.000Z",
      total_companies: 0,
      results: [],
    });
    expect(requests).toHaveLength(0);
  });

  it("rejects input that is not an array", async () => {
    const { complete, requests } = fakeCompleter(() => "ok");
    await expect(
      runBatch({ companies: { name: "Acme" }, template: TEMPLATE, config: CONFIG, complete })
    ).rejects.toThrow("JSON file must contain an array of companies");
    expect(requests).toHaveLength(0);
  });

  it("rejects a missing API key before any call", async () => {
    const { complete, requests } = fakeCompleter(() => "ok");
    await expect(
      runBatch({ companies: ["A", "B"], template: TEMPLATE, config: {}, complete })
    ).rejects.toThrow("Please configure your OpenAI API key in Settings");
    expect(requests).toHaveLength(0);
  });
});
