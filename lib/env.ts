// lib/env.ts
import path from "path";

/**
 * Server-side process settings. These locate the configuration sources;
 * the OpenAI settings themselves are resolved per session in lib/config.ts.
 */
export type ServerEnv = {
  configSheetId: string | null;
  envFilePath: string;
  userSettingsDir: string;
  sampleDataDir: string;
  allowedUsers: string[];
};

export function readServerEnv(env: NodeJS.ProcessEnv = process.env): ServerEnv {
  const cwd = process.cwd();

  return {
    configSheetId: env.CONFIG_SHEET_ID?.trim() || null,
    envFilePath: path.resolve(cwd, env.ENV_FILE_PATH || ".env"),
    userSettingsDir: path.resolve(cwd, env.USER_SETTINGS_DIR || ".user-settings"),
    sampleDataDir: path.resolve(cwd, env.SAMPLE_DATA_DIR || "data"),
    allowedUsers: (env.ALLOWED_USERS ?? "")
      .split(",")
      .map((u) => u.trim())
      .filter(Boolean),
  };
}
