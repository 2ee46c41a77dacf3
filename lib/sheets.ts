// lib/sheets.ts
import { google } from "googleapis";

const SPREADSHEETS_READONLY_SCOPE =
  "https://www.googleapis.com/auth/spreadsheets.readonly";

// Create an authenticated Sheets client using the service account
export async function getSheetsClient() {
  // Support both naming schemes
  const email =
    process.env.GOOGLE_CLIENT_EMAIL ??
    process.env.GOOGLE_SERVICE_ACCOUNT_EMAIL;
  const rawKey =
    process.env.GOOGLE_PRIVATE_KEY ??
    process.env.GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY;

  if (!email || !rawKey) {
    console.error("[Config] Missing Google service account env vars", {
      has_GOOGLE_CLIENT_EMAIL: !!process.env.GOOGLE_CLIENT_EMAIL,
      has_GOOGLE_SERVICE_ACCOUNT_EMAIL: !!process.env.GOOGLE_SERVICE_ACCOUNT_EMAIL,
      has_GOOGLE_PRIVATE_KEY: !!process.env.GOOGLE_PRIVATE_KEY,
      has_GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY:
        !!process.env.GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY,
    });
    throw new Error("Missing Google service account env vars");
  }

  const privateKey = rawKey.replace(/\\n/g, "\n");

  const auth = new google.auth.JWT({
    email,
    key: privateKey,
    scopes: [SPREADSHEETS_READONLY_SCOPE],
  });

  return google.sheets({ version: "v4", auth });
}

// Simple helper to read any range as strings
export async function readRange(
  sheetId: string,
  range: string
): Promise<string[][]> {
  const sheets = await getSheetsClient();
  const res = await sheets.spreadsheets.values.get({
    spreadsheetId: sheetId,
    range,
  });

  const values: unknown[][] = res.data.values ?? [];
  return values.map((row) => row.map((cell) => (cell == null ? "" : String(cell))));
}

/**
 * Read a Key → Value tab into a plain object.
 * Expects columns:
 *   A: Key
 *   B: Value
 *   C: Help (ignored)
 */
export async function readKeyValueTab(
  sheetId: string,
  tabName = "Config"
): Promise<Record<string, string>> {
  const rows = await readRange(sheetId, `${tabName}!A2:C`);
  const out: Record<string, string> = {};

  for (const row of rows) {
    const key = row[0]?.trim();
    if (key) {
      out[key] = row[1] ?? "";
    }
  }

  return out;
}
