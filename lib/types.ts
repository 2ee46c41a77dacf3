// lib/types.ts

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// Canonical configuration keys. Anything else in a secret source or .env blob is dropped.
export const CONFIG_KEYS = [
  "OPENAI_API_KEY",
  "OPENAI_MODEL",
  "MAX_TOKENS",
  "TEMPERATURE",
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export type Configuration = Partial<Record<ConfigKey, string>>;

export type ConfigSource = "sheet" | "user" | "envFile" | "empty";

export interface AnalysisResult {
  company: string;
  // Parsed JSON when the model answered with valid JSON, otherwise the raw text.
  // Batch mode stores "Error: <message>" here for failed items.
  analysis: JsonValue;
  timestamp: string;
}

export interface BatchOutput {
  generated_at: string;
  total_companies: number;
  results: AnalysisResult[];
}

export interface BatchProgress {
  completed: number; // results recorded so far
  index: number; // 1-based position in the input list
  total: number; // input list length, including skipped records
  fraction: number;
  company: string;
}

export interface CrossCheckReport {
  company_name_match: string;
  twitter_handle_validity: string;
  twitter_handle_accuracy: string;
  inconsistencies: string[];
  overall_assessment: string;
  recommendations: string[];
}

// Shape produced by the older validation template.
export interface QualityReport {
  data_completeness: string;
  format_compliance: string;
  data_quality: string;
  missing_elements: string[];
  overall_assessment: string;
  recommendations: string[];
}

// The normalizer does not interpret keys, so a report is any JSON value or raw text.
export type ValidationReport = JsonValue;

export type InputSummary = { type: "input_companies"; count: number | "N/A" };
export type ResultsSummary = {
  type: "expected_results" | "actual_results";
  total_companies: JsonValue | "N/A";
};

export interface ValidationDownload {
  validation_timestamp: string;
  input_summary: InputSummary;
  expected_summary: ResultsSummary;
  actual_summary: ResultsSummary;
  validation_analysis: JsonObject;
}

// Per-user settings file
export interface UserSettings {
  config_settings?: Configuration;
  openai_api_key?: string;
  last_saved?: string;
}
