// lib/configProviders.ts
import type { ConfigProvider } from "./config";
import { parseEnvContent, toConfiguration } from "./config";
import { readEnvFile } from "./envFile";
import type { ServerEnv } from "./env";
import { errorMessage } from "./errors";
import { readKeyValueTab } from "./sheets";
import { configFromUserSettings, loadUserSettings } from "./userSettings";

/**
 * Hosted secrets: the Config tab of a Google Sheet (A: key, B: value).
 * A sheet we cannot reach counts as absent so local sources still apply.
 */
export function sheetSecretsProvider(sheetId: string | null): ConfigProvider {
  return {
    name: "sheet",
    async tryResolve() {
      if (!sheetId) return null;
      try {
        const config = toConfiguration(await readKeyValueTab(sheetId));
        return Object.keys(config).length ? config : null;
      } catch (err) {
        console.warn(
          "[Config] Could not read secrets sheet; falling back to local sources.",
          errorMessage(err)
        );
        return null;
      }
    },
  };
}

export function userSettingsProvider(dir: string, username: string): ConfigProvider {
  return {
    name: "user",
    async tryResolve() {
      return configFromUserSettings(await loadUserSettings(dir, username));
    },
  };
}

export function envFileProvider(filePath: string): ConfigProvider {
  return {
    name: "envFile",
    async tryResolve() {
      const content = await readEnvFile(filePath);
      if (!content) return null;
      const config = toConfiguration(parseEnvContent(content));
      return Object.keys(config).length ? config : null;
    },
  };
}

/**
 * Resolution order: hosted secrets, the user's saved settings, the local .env file.
 */
export function defaultProviders(env: ServerEnv, username: string): ConfigProvider[] {
  return [
    sheetSecretsProvider(env.configSheetId),
    userSettingsProvider(env.userSettingsDir, username),
    envFileProvider(env.envFilePath),
  ];
}
