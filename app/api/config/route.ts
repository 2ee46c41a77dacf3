// app/api/config/route.ts
import { NextRequest, NextResponse } from "next/server";
import {
  clearApiKey,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  describeConfig,
  saveSettings,
} from "@/lib/config";
import type { Configuration } from "@/lib/types";
import { errorResponse, readJsonBody, requireSession, sessionStore } from "@/lib/http";
import { withConfig } from "@/lib/sessions";
import {
  clearUserSettings,
  loadUserSettings,
  removeStoredApiKey,
  saveUserSettings,
} from "@/lib/userSettings";

export const runtime = "nodejs";

function toNumberOr(raw: unknown, fallback: number): number {
  if (typeof raw === "number" && Number.isFinite(raw)) return raw;
  if (typeof raw === "string" && raw.trim() !== "") {
    const n = Number(raw);
    if (Number.isFinite(n)) return n;
  }
  return fallback;
}

/**
 * GET /api/config
 * Masked view of the active configuration. The API key itself never leaves the server.
 */
export async function GET(req: NextRequest) {
  try {
    const { session, env } = await requireSession(req);
    const stored = await loadUserSettings(env.userSettingsDir, session.username);

    return NextResponse.json({
      ...describeConfig(session.config),
      source: session.configSource,
      lastSaved: stored.last_saved ?? null,
    });
  } catch (err) {
    return errorResponse("GET /api/config", err);
  }
}

/**
 * POST /api/config
 * Body:
 * {
 *   apiKey?: string;      // blank keeps the current key
 *   model?: string;
 *   maxTokens?: number;
 *   temperature?: number;
 * }
 */
export async function POST(req: NextRequest) {
  try {
    const { sessionId, session, env } = await requireSession(req);
    const body = await readJsonBody(req);

    const config = saveSettings(session.config, {
      apiKey: typeof body.apiKey === "string" ? body.apiKey : "",
      model: typeof body.model === "string" ? body.model : "",
      maxTokens: Math.trunc(toNumberOr(body.maxTokens, DEFAULT_MAX_TOKENS)),
      temperature: toNumberOr(body.temperature, DEFAULT_TEMPERATURE),
    });

    // Persist first: if the write fails, the session keeps its previous mapping.
    const stored = await saveUserSettings(env.userSettingsDir, session.username, config);
    sessionStore.update(sessionId, (s) => withConfig(s, config));

    return NextResponse.json({
      ...describeConfig(config),
      source: session.configSource,
      lastSaved: stored.last_saved ?? null,
    });
  } catch (err) {
    return errorResponse("POST /api/config", err);
  }
}

/**
 * DELETE /api/config?scope=all|apiKey
 */
export async function DELETE(req: NextRequest) {
  try {
    const { sessionId, session, env } = await requireSession(req);
    const scope = req.nextUrl.searchParams.get("scope") === "apiKey" ? "apiKey" : "all";

    let config: Configuration = {};
    if (scope === "apiKey") {
      await removeStoredApiKey(env.userSettingsDir, session.username);
      config = clearApiKey(session.config);
    } else {
      await clearUserSettings(env.userSettingsDir, session.username);
    }

    sessionStore.update(sessionId, (s) => withConfig(s, config));

    return NextResponse.json({
      ...describeConfig(config),
      source: session.configSource,
      lastSaved: null,
    });
  } catch (err) {
    return errorResponse("DELETE /api/config", err);
  }
}
