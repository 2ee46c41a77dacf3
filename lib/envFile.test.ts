import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { readEnvFile, writeEnvFile } from "./envFile";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "env-file-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("env file", () => {
  it("is null when missing", async () => {
    expect(await readEnvFile(path.join(dir, ".env"))).toBeNull();
  });

  it("writes the raw text back out", async () => {
    const file = path.join(dir, ".env");
    await writeEnvFile(file, "OPENAI_MODEL=gpt-4o\n# note\n");
    expect(await readEnvFile(file)).toBe("OPENAI_MODEL=gpt-4o\n# note\n");
  });
});
