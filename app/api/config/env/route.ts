// app/api/config/env/route.ts
import { NextRequest, NextResponse } from "next/server";
import { describeConfig, loadEnvContent, maskVariable } from "@/lib/config";
import { writeEnvFile } from "@/lib/envFile";
import { AppError } from "@/lib/errors";
import { errorResponse, readJsonBody, requireSession, sessionStore } from "@/lib/http";
import { withConfig } from "@/lib/sessions";
import { saveUserSettings } from "@/lib/userSettings";

export const runtime = "nodejs";

/**
 * POST /api/config/env
 * Body: { content: string; action: "load" | "save" }
 *
 * "load" parses pasted .env text and replaces the active configuration.
 * "save" writes the raw text to the server's .env file.
 */
export async function POST(req: NextRequest) {
  try {
    const { sessionId, session, env } = await requireSession(req);
    const body = await readJsonBody(req);
    const content = typeof body.content === "string" ? body.content : "";

    if (body.action === "save") {
      if (!content.trim()) {
        throw new AppError("validation", "No content to save");
      }
      await writeEnvFile(env.envFilePath, content);
      return NextResponse.json({ saved: true, path: env.envFilePath });
    }

    const { config, variables } = loadEnvContent(content);

    await saveUserSettings(env.userSettingsDir, session.username, config);
    sessionStore.update(sessionId, (s) => withConfig(s, config));

    return NextResponse.json({
      loaded: Object.keys(variables).length,
      variables: Object.entries(variables).map(([key, value]) => ({
        key,
        value: maskVariable(key, value),
      })),
      config: describeConfig(config),
    });
  } catch (err) {
    return errorResponse("POST /api/config/env", err);
  }
}
