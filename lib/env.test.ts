import path from "path";
import { describe, it, expect } from "vitest";
import { readServerEnv } from "./env";

describe("readServerEnv", () => {
  it("applies defaults relative to the working directory", () => {
    const env = readServerEnv({});
    expect(env).toEqual({
      configSheetId: null,
      envFilePath: path.resolve(process.cwd(), ".env"),
      userSettingsDir: path.resolve(process.cwd(), ".user-settings"),
      sampleDataDir: path.resolve(process.cwd(), "data"),
      allowedUsers: [],
    });
  });

  it("parses the allow-list and trims the sheet id", () => {
    const env = readServerEnv({ ALLOWED_USERS: " analyst, ,reviewer ", CONFIG_SHEET_ID: " sheet-1 " });
    expect(env.allowedUsers).toEqual(["analyst", "reviewer"]);
    expect(env.configSheetId).toBe("sheet-1");
  });
});
