import type {
  AnalysisResult,
  BatchOutput,
  BatchProgress,
  ConfigSource,
  InputSummary,
  JsonValue,
  ResultsSummary,
  ValidationDownload,
  ValidationReport,
} from "@/lib/types";

export type MainTab = "analysis" | "validation" | "settings";
export type ModelSelectionMode = "known" | "custom";
export type DataSource = "sample" | "upload";
export type ActualSource = "batch" | "upload";

export type ConfigResponse = {
  hasApiKey: boolean;
  maskedApiKey: string | null;
  model: string;
  maxTokens: number;
  temperature: number;
  totalVariables: number;
  source: ConfigSource;
  lastSaved: string | null;
};

export type SessionResponse = {
  username: string;
  config: Omit<ConfigResponse, "source" | "lastSaved">;
  configSource: ConfigSource;
  lastResult: AnalysisResult | null;
  batchOutput: BatchOutput | null;
  validationResult: ValidationReport | null;
};

export type EnvLoadResponse = {
  loaded: number;
  variables: { key: string; value: string }[];
};

export type ValidationResponse = {
  report: ValidationReport;
  summaries: {
    input_summary: InputSummary;
    expected_summary: ResultsSummary;
    actual_summary: ResultsSummary;
  };
  download: ValidationDownload | null;
};

// A JSON file the user picked or a sample the server returned.
export type LoadedJson = {
  label: string;
  data: JsonValue;
};

export type BatchRunState = {
  running: boolean;
  progress: BatchProgress | null;
};

export type ApiError = { error?: string };
