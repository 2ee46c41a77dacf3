// lib/userSettings.ts
import { promises as fs } from "fs";
import path from "path";
import type { Configuration, UserSettings } from "./types";
import { toConfiguration } from "./config";
import { AppError, errorMessage, isNodeErrorWithCode } from "./errors";
import { base64UrlEncode } from "./sessions";

/**
 * One JSON file per user: { config_settings, openai_api_key, last_saved }.
 * Keyed by the login name, not by anything derived from server state.
 */
export function userSettingsPath(dir: string, username: string): string {
  return path.join(dir, `${base64UrlEncode(username.trim().toLowerCase())}.json`);
}

function parseUserSettings(raw: string): UserSettings {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("settings file must contain a JSON object");
  }

  const settings: UserSettings = {};

  if ("config_settings" in parsed && typeof parsed.config_settings === "object" && parsed.config_settings) {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed.config_settings)) {
      if (typeof value === "string") record[key] = value;
    }
    settings.config_settings = toConfiguration(record);
  }
  if ("openai_api_key" in parsed && typeof parsed.openai_api_key === "string") {
    settings.openai_api_key = parsed.openai_api_key;
  }
  if ("last_saved" in parsed && typeof parsed.last_saved === "string") {
    settings.last_saved = parsed.last_saved;
  }

  return settings;
}

export async function loadUserSettings(
  dir: string,
  username: string
): Promise<UserSettings> {
  const filePath = userSettingsPath(dir, username);

  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isNodeErrorWithCode(err, "ENOENT")) return {};
    throw new AppError("io", `Error reading user settings: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  try {
    return parseUserSettings(raw);
  } catch (err) {
    throw new AppError("io", `Invalid user settings file: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

async function writeUserSettings(
  dir: string,
  username: string,
  settings: UserSettings
): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(
      userSettingsPath(dir, username),
      JSON.stringify(settings, null, 2),
      "utf8"
    );
  } catch (err) {
    throw new AppError("io", `Error saving user settings: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

/**
 * Persist the whole active mapping. Returns what was written.
 */
export async function saveUserSettings(
  dir: string,
  username: string,
  config: Configuration,
  now: Date = new Date()
): Promise<UserSettings> {
  const settings: UserSettings = {
    config_settings: config,
    last_saved: now.toISOString(),
  };
  if (config.OPENAI_API_KEY) {
    settings.openai_api_key = config.OPENAI_API_KEY;
  }

  await writeUserSettings(dir, username, settings);
  return settings;
}

export async function clearUserSettings(dir: string, username: string): Promise<void> {
  await writeUserSettings(dir, username, {});
}

export async function removeStoredApiKey(dir: string, username: string): Promise<void> {
  const settings = await loadUserSettings(dir, username);
  const { openai_api_key: _dropped, ...rest } = settings;

  if (rest.config_settings) {
    const { OPENAI_API_KEY: _key, ...config } = rest.config_settings;
    rest.config_settings = config;
  }

  await writeUserSettings(dir, username, rest);
}

/**
 * The saved mapping, with the top-level key folded back in when the
 * config block lost it.
 */
export function configFromUserSettings(settings: UserSettings): Configuration | null {
  const config: Configuration = { ...(settings.config_settings ?? {}) };
  if (!config.OPENAI_API_KEY && settings.openai_api_key) {
    config.OPENAI_API_KEY = settings.openai_api_key;
  }
  return Object.keys(config).length ? config : null;
}
