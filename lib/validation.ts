// lib/validation.ts
import type {
  Configuration,
  InputSummary,
  JsonValue,
  ResultsSummary,
  ValidationDownload,
  ValidationReport,
} from "./types";
import { hasApiKey } from "./config";
import { AppError, toRemoteError } from "./errors";
import { normalizeResponse } from "./normalize";
import { buildChatRequest, type ChatCompleter } from "./openai";
import { isJsonObject } from "./reports";
import { DEFAULT_VALIDATION_PROMPT, substitutePlaceholders } from "./prompt";

export const VALIDATOR_SYSTEM_MESSAGE =
  "You are a data validation expert specializing in JSON data analysis and comparison.";

export type ValidationRunInput = {
  inputJson: JsonValue | undefined;
  expectedJson: JsonValue | undefined;
  actualJson: JsonValue | undefined;
  config: Configuration;
  complete: ChatCompleter;
  template?: string;
};

export function buildValidationPrompt(
  template: string,
  inputJson: JsonValue,
  expectedJson: JsonValue,
  actualJson: JsonValue
): string {
  return substitutePlaceholders(template, {
    input_json: JSON.stringify(inputJson, null, 2),
    expected_json: JSON.stringify(expectedJson, null, 2),
    actual_json: JSON.stringify(actualJson, null, 2),
  });
}

export async function runValidation(input: ValidationRunInput): Promise<ValidationReport> {
  if (!hasApiKey(input.config)) {
    throw new AppError("validation", "Please configure your OpenAI API key in Settings");
  }

  const { inputJson, expectedJson, actualJson } = input;
  if (inputJson == null || expectedJson == null || actualJson == null) {
    throw new AppError(
      "validation",
      "Please load all three JSON files before running validation"
    );
  }

  const prompt = buildValidationPrompt(
    input.template ?? DEFAULT_VALIDATION_PROMPT,
    inputJson,
    expectedJson,
    actualJson
  );

  let text: string;
  try {
    text = await input.complete(
      buildChatRequest(input.config, VALIDATOR_SYSTEM_MESSAGE, prompt)
    );
  } catch (err) {
    throw toRemoteError(err);
  }

  return normalizeResponse(text);
}

function resultsSummary(
  type: ResultsSummary["type"],
  value: JsonValue | undefined
): ResultsSummary {
  if (!isJsonObject(value)) return { type, total_companies: "N/A" };
  return { type, total_companies: value.total_companies ?? 0 };
}

export function summarizeInputs(
  inputJson: JsonValue | undefined,
  expectedJson: JsonValue | undefined,
  actualJson: JsonValue | undefined
): {
  input_summary: InputSummary;
  expected_summary: ResultsSummary;
  actual_summary: ResultsSummary;
} {
  return {
    input_summary: {
      type: "input_companies",
      count: Array.isArray(inputJson) ? inputJson.length : "N/A",
    },
    expected_summary: resultsSummary("expected_results", expectedJson),
    actual_summary: resultsSummary("actual_results", actualJson),
  };
}

/**
 * Downloadable report envelope. Only structured (object) analyses are downloadable.
 */
export function buildValidationDownload(
  report: ValidationReport,
  inputJson: JsonValue | undefined,
  expectedJson: JsonValue | undefined,
  actualJson: JsonValue | undefined,
  now: Date = new Date()
): ValidationDownload | null {
  if (!isJsonObject(report)) return null;

  return {
    validation_timestamp: now.toISOString(),
    ...summarizeInputs(inputJson, expectedJson, actualJson),
    validation_analysis: report,
  };
}
