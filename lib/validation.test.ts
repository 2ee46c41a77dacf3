import { describe, it, expect } from "vitest";
import type { ChatCompleter, ChatCompletionRequest } from "./openai";
import { LEGACY_VALIDATION_PROMPT } from "./prompt";
import { isCrossCheckReport, isQualityReport } from "./reports";
import type { Configuration } from "./types";
import {
  VALIDATOR_SYSTEM_MESSAGE,
  buildValidationDownload,
  buildValidationPrompt,
  runValidation,
  summarizeInputs,
} from "./validation";

const CONFIG: Configuration = { OPENAI_API_KEY: "test-secret" };

const CROSS_CHECK_REPLY = JSON.stringify({
  company_name_match: "all match",
  twitter_handle_validity: "valid",
  twitter_handle_accuracy: "plausible",
  inconsistencies: [],
  overall_assessment: "usable",
  recommendations: ["spot-check smaller companies"],
});

function fakeCompleter(reply: string) {
  const requests: ChatCompletionRequest[] = [];
  const complete: ChatCompleter = async (request) => {
    requests.push(request);
    return reply;
  };
  return { complete, requests };
}

describe("buildValidationPrompt", () => {
  it("inserts the three documents as indented JSON", () => {
    const prompt = buildValidationPrompt(
      "I={input_json}|E={expected_json}|A={actual_json}",
      ["Acme"],
      { total_companies: 1 },
      { total_companies: 0 }
    );
    expect(prompt).toBe(
      'I=[\n  "Acme"\n]|E={\n  "total_companies": 1\n}|A={\n  "total_companies": 0\n}'
    );
  });

  it("keeps the literal response schema of the older template", () => {
    const prompt = buildValidationPrompt(LEGACY_VALIDATION_PROMPT, [], {}, {});
    expect(prompt).toContain('{\n  "data_completeness": "score/assessment",');
    expect(prompt).toContain("**INPUT DATA:**\n[]");
  });
});

describe("runValidation", () => {
  it("checks the API key before the inputs", async () => {
    const { complete, requests } = fakeCompleter(CROSS_CHECK_REPLY);
    await expect(
      runValidation({
        inputJson: undefined,
        expectedJson: undefined,
        actualJson: undefined,
        config: {},
        complete,
      })
    ).rejects.toThrow("Please configure your OpenAI API key in Settings");
    expect(requests).toHaveLength(0);
  });

  it("requires all three documents", async () => {
    const { complete, requests } = fakeCompleter(CROSS_CHECK_REPLY);
    await expect(
      runValidation({
        inputJson: ["Acme"],
        expectedJson: { total_companies: 1 },
        actualJson: undefined,
        config: CONFIG,
        complete,
      })
    ).rejects.toThrow("Please load all three JSON files before running validation");
    expect(requests).toHaveLength(0);
  });

  it("returns a structured report from the default template", async () => {
    const { complete, requests } = fakeCompleter(CROSS_CHECK_REPLY);
    const report = await runValidation({
      inputJson: ["Acme"],
      expectedJson: { total_companies: 1, results: [] },
      actualJson: { total_companies: 1, results: [] },
      config: CONFIG,
      complete,
    });

    expect(isCrossCheckReport(report)).toBe(true);
    expect(isQualityReport(report)).toBe(false);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.messages[0]).toEqual({ role: "system", content: VALIDATOR_SYSTEM_MESSAGE });
    expect(requests[0]?.messages[1]?.content).toContain('**INPUT DATA (original companies):**\n[\n  "Acme"\n]');
  });

  it("keeps a non-JSON reply as text", async () => {
    const { complete } = fakeCompleter("Looks fine overall.");
    const report = await runValidation({
      inputJson: [],
      expectedJson: {},
      actualJson: {},
      config: CONFIG,
      complete,
      template: "{input_json}",
    });
    expect(report).toBe("Looks fine overall.");
  });
});

describe("summarizeInputs", () => {
  it("counts inputs and reads total_companies", () => {
    expect(summarizeInputs(["a", "b"], { total_companies: 2 }, { results: [] })).toEqual({
      input_summary: { type: "input_companies", count: 2 },
      expected_summary: { type: "expected_results", total_companies: 2 },
      actual_summary: { type: "actual_results", total_companies: 0 },
    });
  });

  it("reports N/A for unexpected shapes", () => {
    expect(summarizeInputs("text", [1], null)).toEqual({
      input_summary: { type: "input_companies", count: "N/A" },
      expected_summary: { type: "expected_results", total_companies: "N/A" },
      actual_summary: { type: "actual_results", total_companies: "N/A" },
    });
  });
});

describe("buildValidationDownload", () => {
  const when = new Date("2026-03-04T05:06:07.000Z");

  it("wraps a structured report with the input summaries", () => {
    const report = JSON.parse(CROSS_CHECK_REPLY);
    expect(buildValidationDownload(report, ["Acme"], { total_companies: 1 }, { total_companies: 1 }, when)).toEqual({
      validation_timestamp: "2026-03-04T05:06:07.000Z",
      input_summary: { type: "input_companies", count: 1 },
      expected_summary: { type: "expected_results", total_companies: 1 },
      actual_summary: { type: "actual_results", total_companies: 1 },
      validation_analysis: report,
    });
  });

  it("offers no download for a text report", () => {
    expect(buildValidationDownload("Looks fine", [], {}, {}, when)).toBeNull();
  });
});
