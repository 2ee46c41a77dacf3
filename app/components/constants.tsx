export type KnownModel = { id: string; label: string };

export const KNOWN_MODELS: KnownModel[] = [
  { id: "gpt-3.5-turbo", label: "gpt-3.5-turbo (default)" },
  { id: "gpt-4o-mini", label: "gpt-4o-mini (cheap, very fast)" },
  { id: "gpt-4.1-mini", label: "gpt-4.1-mini (small, big context)" },
  { id: "gpt-4o", label: "gpt-4o (more accurate handles)" },
  { id: "gpt-4-turbo", label: "gpt-4-turbo" },
];

// Rough prices per 1M tokens (estimates only)
export const MODEL_PRICING: Record<string, { input: number; output: number }> = {
  "gpt-3.5-turbo": { input: 0.5, output: 1.5 },
  "gpt-4.1-mini": { input: 0.4, output: 1.6 },
  "gpt-4o": { input: 2.5, output: 10.0 },
  "gpt-4o-mini": { input: 0.15, output: 0.6 },
  "gpt-4-turbo": { input: 10.0, output: 30.0 },
};

export const OUTCOME_COLORS = ["#22c55e", "#6b7280", "#ef4444"];
