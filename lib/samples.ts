// lib/samples.ts
import { promises as fs } from "fs";
import path from "path";
import type { JsonValue } from "./types";
import { AppError, errorMessage, isNodeErrorWithCode } from "./errors";

export type SampleKind = "input" | "expected";

// File names as shipped with the dashboard's sample data.
export const SAMPLE_FILES: Record<SampleKind, string> = {
  input: "deafult_Input.json",
  expected: "expected_output.json",
};

export function isSampleKind(value: string | null): value is SampleKind {
  return value === "input" || value === "expected";
}

export async function loadSampleJson(dir: string, kind: SampleKind): Promise<JsonValue> {
  const filePath = path.join(dir, SAMPLE_FILES[kind]);

  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isNodeErrorWithCode(err, "ENOENT")) {
      throw new AppError("validation", `Sample file not found at ${filePath}`);
    }
    throw new AppError("io", `Error loading sample file: ${errorMessage(err)}`, { cause: err });
  }

  try {
    const parsed: JsonValue = JSON.parse(raw);
    return parsed;
  } catch (err) {
    throw new AppError("io", `Error loading sample file: ${errorMessage(err)}`, { cause: err });
  }
}
