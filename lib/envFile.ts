// lib/envFile.ts
import { promises as fs } from "fs";
import { AppError, errorMessage, isNodeErrorWithCode } from "./errors";

/**
 * Read the local .env file. A missing file is not an error (returns null);
 * anything else that stops us reading it is reported as an IO failure.
 */
export async function readEnvFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isNodeErrorWithCode(err, "ENOENT")) return null;
    console.error("[Config] Error reading .env file:", err);
    throw new AppError("io", `Error reading .env file: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

export async function writeEnvFile(filePath: string, content: string): Promise<void> {
  try {
    await fs.writeFile(filePath, content, "utf8");
  } catch (err) {
    console.error("[Config] Error saving .env file:", err);
    throw new AppError("io", `Error saving .env file: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
