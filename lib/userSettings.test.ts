import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  clearUserSettings,
  configFromUserSettings,
  loadUserSettings,
  removeStoredApiKey,
  saveUserSettings,
  userSettingsPath,
} from "./userSettings";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "user-settings-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("userSettingsPath", () => {
  it("is keyed by the normalized username", () => {
    expect(userSettingsPath(dir, " Analyst ")).toBe(userSettingsPath(dir, "analyst"));
    expect(userSettingsPath(dir, "analyst")).not.toBe(userSettingsPath(dir, "reviewer"));
    expect(path.dirname(userSettingsPath(dir, "analyst"))).toBe(dir);
  });
});

describe("user settings file", () => {
  it("is empty when nothing was saved", async () => {
    expect(await loadUserSettings(dir, "analyst")).toEqual({});
  });

  it("round-trips a saved mapping", async () => {
    const when = new Date("2026-05-06T07:08:09.000Z");
    const written = await saveUserSettings(
      dir,
      "analyst",
      { OPENAI_API_KEY: "test-secret", OPENAI_MODEL: "gpt-4o" },
      when
    );

    expect(written).toEqual({
      config_settings: { OPENAI_API_KEY: "test-secret", OPENAI_MODEL: "gpt-4o" },
      last_saved: "2026-05-06T07:08:09.000Z",
      openai_api_key: "test-secret",
    });
    expect(await loadUserSettings(dir, "analyst")).toEqual(written);
    expect(await loadUserSettings(dir, "reviewer")).toEqual({});
  });

  it("clears to an empty object", async () => {
    await saveUserSettings(dir, "analyst", { OPENAI_MODEL: "gpt-4o" });
    await clearUserSettings(dir, "analyst");

    expect(await loadUserSettings(dir, "analyst")).toEqual({});
    expect(await fs.readFile(userSettingsPath(dir, "analyst"), "utf8")).toBe("{}");
  });

  it("removes only the stored API key", async () => {
    const when = new Date("2026-05-06T07:08:09.000Z");
    await saveUserSettings(dir, "analyst", { OPENAI_API_KEY: "test-secret", MAX_TOKENS: "300" }, when);
    await removeStoredApiKey(dir, "analyst");

    expect(await loadUserSettings(dir, "analyst")).toEqual({
      config_settings: { MAX_TOKENS: "300" },
      last_saved: "2026-05-06T07:08:09.000Z",
    });
  });

  it("reports an unreadable file as an io error", async () => {
    await fs.writeFile(userSettingsPath(dir, "analyst"), "[1, 2]", "utf8");
    await expect(loadUserSettings(dir, "analyst")).rejects.toThrow(
      "Invalid user settings file: settings file must contain a JSON object"
    );
  });
});

describe("configFromUserSettings", () => {
  it("folds the top-level key back into the mapping", () => {
    expect(
      configFromUserSettings({ config_settings: { OPENAI_MODEL: "gpt-4o" }, openai_api_key: "test-secret" })
    ).toEqual({ OPENAI_MODEL: "gpt-4o", OPENAI_API_KEY: "test-secret" });
  });

  it("is null for empty settings", () => {
    expect(configFromUserSettings({})).toBeNull();
    expect(configFromUserSettings({ last_saved: "2026-01-01T00:00:00.000Z" })).toBeNull();
  });
});
