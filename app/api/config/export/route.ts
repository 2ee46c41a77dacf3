// app/api/config/export/route.ts
import { NextRequest, NextResponse } from "next/server";
import { maskApiKey } from "@/lib/config";
import { AppError } from "@/lib/errors";
import { errorResponse, requireSession } from "@/lib/http";
import { loadUserSettings } from "@/lib/userSettings";

export const runtime = "nodejs";

/**
 * GET /api/config/export
 * The caller's stored settings file, with the API key masked.
 */
export async function GET(req: NextRequest) {
  try {
    const { session, env } = await requireSession(req);
    const settings = await loadUserSettings(env.userSettingsDir, session.username);

    if (Object.keys(settings).length === 0) {
      throw new AppError("validation", "No settings to export");
    }

    const { openai_api_key, config_settings, ...rest } = settings;
    const exported = {
      ...rest,
      ...(config_settings
        ? {
            config_settings: {
              ...config_settings,
              ...(config_settings.OPENAI_API_KEY
                ? { OPENAI_API_KEY: maskApiKey(config_settings.OPENAI_API_KEY) }
                : {}),
            },
          }
        : {}),
      ...(openai_api_key ? { openai_api_key: maskApiKey(openai_api_key) } : {}),
    };

    return NextResponse.json({ username: session.username, settings: exported });
  } catch (err) {
    return errorResponse("GET /api/config/export", err);
  }
}
