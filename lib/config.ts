// lib/config.ts
import { CONFIG_KEYS } from "./types";
import type { ConfigKey, Configuration, ConfigSource } from "./types";
import { AppError, errorMessage } from "./errors";

export const DEFAULT_MODEL = "gpt-3.5-turbo";
export const DEFAULT_MAX_TOKENS = 1000;
export const DEFAULT_TEMPERATURE = 0.7;

/**
 * A named configuration source. `tryResolve` returns null when the
 * source is absent or has nothing usable in it.
 */
export interface ConfigProvider {
  name: Exclude<ConfigSource, "empty">;
  tryResolve(): Promise<Configuration | null>;
}

export type ResolvedConfig = {
  config: Configuration;
  source: ConfigSource;
};

/**
 * First provider with a non-empty mapping wins; otherwise an empty mapping.
 * A provider that fails counts as absent.
 */
export async function resolveConfig(providers: ConfigProvider[]): Promise<ResolvedConfig> {
  for (const provider of providers) {
    let config: Configuration | null;
    try {
      config = await provider.tryResolve();
    } catch (err) {
      console.warn(`[Config] Skipping ${provider.name} source:`, errorMessage(err));
      continue;
    }
    if (config && Object.keys(config).length > 0) {
      return { config, source: provider.name };
    }
  }
  return { config: {}, source: "empty" };
}

function toConfigKey(raw: string): ConfigKey | null {
  const upper = raw.trim().toUpperCase();
  return CONFIG_KEYS.find((k) => k === upper) ?? null;
}

/**
 * Map arbitrary keys case-insensitively onto the canonical keys, dropping the rest.
 */
export function toConfiguration(record: Record<string, string>): Configuration {
  const config: Configuration = {};
  for (const [rawKey, value] of Object.entries(record)) {
    const key = toConfigKey(rawKey);
    if (key) config[key] = value;
  }
  return config;
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Parse KEY=VALUE text. '#' lines and lines without '=' are ignored.
 */
export function parseEnvContent(content: string): Record<string, string> {
  const vars: Record<string, string> = {};

  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    const eq = line.indexOf("=");
    if (eq === -1) continue;

    const key = line.slice(0, eq).trim();
    if (!key) continue;

    vars[key] = unquote(line.slice(eq + 1).trim());
  }

  return vars;
}

/**
 * Read numeric config with a fallback for missing or unparseable values.
 */
function getNumericConfig(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

export function getModel(config: Configuration): string {
  return config.OPENAI_MODEL?.trim() || DEFAULT_MODEL;
}

export function getMaxTokens(config: Configuration): number {
  return Math.trunc(getNumericConfig(config.MAX_TOKENS, DEFAULT_MAX_TOKENS));
}

export function getTemperature(config: Configuration): number {
  return getNumericConfig(config.TEMPERATURE, DEFAULT_TEMPERATURE);
}

export function hasApiKey(config: Configuration): boolean {
  return Boolean(config.OPENAI_API_KEY?.trim());
}

export type SettingsInput = {
  apiKey?: string;
  model: string;
  maxTokens: number;
  temperature: number;
};

/**
 * Build the replacement mapping for an explicit save. The whole mapping is
 * replaced, except that a blank API key keeps the current one.
 */
export function saveSettings(current: Configuration, input: SettingsInput): Configuration {
  const next: Configuration = {
    OPENAI_MODEL: input.model.trim() || DEFAULT_MODEL,
    MAX_TOKENS: String(input.maxTokens),
    TEMPERATURE: String(input.temperature),
  };

  const newKey = input.apiKey?.trim();
  if (newKey) {
    next.OPENAI_API_KEY = newKey;
  } else if (current.OPENAI_API_KEY) {
    next.OPENAI_API_KEY = current.OPENAI_API_KEY;
  }

  return next;
}

export type EnvLoadResult = {
  config: Configuration;
  variables: Record<string, string>;
};

/**
 * Replace the mapping from pasted .env text.
 */
export function loadEnvContent(content: string): EnvLoadResult {
  if (!content.trim()) {
    throw new AppError("validation", "Please enter .env file content");
  }

  const variables = parseEnvContent(content);
  if (Object.keys(variables).length === 0) {
    throw new AppError("validation", "No valid environment variables found in the content");
  }

  return { config: toConfiguration(variables), variables };
}

export function clearApiKey(config: Configuration): Configuration {
  const { OPENAI_API_KEY: _removed, ...rest } = config;
  return rest;
}

export function maskApiKey(key: string | undefined): string | null {
  if (!key) return null;
  return `sk-***${key.slice(-4)}`;
}

/**
 * Display-safe value for a loaded variable: secrets show their last 4 characters only.
 */
export function maskVariable(key: string, value: string): string {
  const upper = key.toUpperCase();
  if (upper.includes("KEY") || upper.includes("SECRET") || upper.includes("API")) {
    return value.length > 4 ? `***${value.slice(-4)}` : "***";
  }
  return value;
}

export type ConfigView = {
  hasApiKey: boolean;
  maskedApiKey: string | null;
  model: string;
  maxTokens: number;
  temperature: number;
  totalVariables: number;
};

export function describeConfig(config: Configuration): ConfigView {
  return {
    hasApiKey: hasApiKey(config),
    maskedApiKey: maskApiKey(config.OPENAI_API_KEY),
    model: getModel(config),
    maxTokens: getMaxTokens(config),
    temperature: getTemperature(config),
    totalVariables: Object.keys(config).length,
  };
}
