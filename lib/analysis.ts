// lib/analysis.ts
import type {
  AnalysisResult,
  BatchOutput,
  BatchProgress,
  Configuration,
  JsonValue,
} from "./types";
import { hasApiKey } from "./config";
import { AppError, errorMessage, toRemoteError } from "./errors";
import { normalizeResponse } from "./normalize";
import { buildChatRequest, type ChatCompleter } from "./openai";
import { formatPrompt } from "./prompt";

export const ANALYST_SYSTEM_MESSAGE =
  "You are a business analyst providing detailed company analysis.";

export type SingleRunInput = {
  companyName: string;
  template: string;
  config: Configuration;
  complete: ChatCompleter;
  now?: () => Date;
};

export type BatchRunInput = {
  companies: unknown;
  template: string;
  config: Configuration;
  complete: ChatCompleter;
  onProgress?: (progress: BatchProgress) => void;
  now?: () => Date;
};

function requireApiKey(config: Configuration): void {
  if (!hasApiKey(config)) {
    throw new AppError("validation", "Please configure your OpenAI API key in Settings");
  }
}

/**
 * Display name for a batch record, or null for shapes we skip.
 */
export function resolveCompanyName(record: unknown): string | null {
  if (typeof record === "string") return record;
  if (typeof record === "object" && record !== null && !Array.isArray(record) && "name" in record) {
    const name = record.name;
    if (typeof name === "string") return name;
    if (typeof name === "object" && name !== null) return JSON.stringify(name);
    return String(name);
  }
  return null;
}

// Prompt errors keep their own kind; anything thrown by the completion call is remote.
async function analyzeCompany(
  companyName: string,
  template: string,
  config: Configuration,
  complete: ChatCompleter
): Promise<JsonValue> {
  const prompt = formatPrompt(template, companyName);
  const request = buildChatRequest(config, ANALYST_SYSTEM_MESSAGE, prompt);

  let text: string;
  try {
    text = await complete(request);
  } catch (err) {
    throw toRemoteError(err);
  }

  return normalizeResponse(text);
}

export async function runSingle(input: SingleRunInput): Promise<AnalysisResult> {
  const now = input.now ?? (() => new Date());
  const companyName = input.companyName;

  if (!companyName.trim()) {
    throw new AppError("validation", "Please enter a company name");
  }
  requireApiKey(input.config);

  const analysis = await analyzeCompany(
    companyName,
    input.template,
    input.config,
    input.complete
  );

  return {
    company: companyName,
    analysis,
    timestamp: now().toISOString(),
  };
}

/**
 * Process companies one at a time, in input order. A failing item is
 * recorded as "Error: <message>" and the loop moves on.
 */
export async function runBatch(input: BatchRunInput): Promise<BatchOutput> {
  const now = input.now ?? (() => new Date());

  if (!Array.isArray(input.companies)) {
    throw new AppError("validation", "JSON file must contain an array of companies");
  }
  requireApiKey(input.config);

  const companies: unknown[] = input.companies;
  const total = companies.length;
  const results: AnalysisResult[] = [];

  for (let i = 0; i < total; i++) {
    const company = resolveCompanyName(companies[i]);
    if (company === null) continue;

    let analysis: JsonValue;
    try {
      analysis = await analyzeCompany(company, input.template, input.config, input.complete);
    } catch (err) {
      console.warn(`[Batch] ${company} failed:`, errorMessage(err));
      analysis = `Error: ${errorMessage(err)}`;
    }

    results.push({ company, analysis, timestamp: now().toISOString() });

    input.onProgress?.({
      completed: results.length,
      index: i + 1,
      total,
      fraction: (i + 1) / total,
      company,
    });
  }

  return {
    generated_at: now().toISOString(),
    total_companies: results.length,
    results,
  };
}
