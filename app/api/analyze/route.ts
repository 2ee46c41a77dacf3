// app/api/analyze/route.ts
import { NextRequest, NextResponse } from "next/server";
import { runSingle } from "@/lib/analysis";
import { errorResponse, readJsonBody, requireSession, sessionStore } from "@/lib/http";
import { createOpenAICompleter } from "@/lib/openai";
import { DEFAULT_ANALYSIS_PROMPT } from "@/lib/prompt";
import { withSingleResult } from "@/lib/sessions";

export const runtime = "nodejs";

/**
 * POST /api/analyze
 * Body: { companyName: string; template?: string }
 *
 * One completion call. On failure the session's last result is left as it was.
 */
export async function POST(req: NextRequest) {
  try {
    const { sessionId, session } = await requireSession(req);
    const body = await readJsonBody(req);

    const result = await runSingle({
      companyName: typeof body.companyName === "string" ? body.companyName : "",
      template: typeof body.template === "string" ? body.template : DEFAULT_ANALYSIS_PROMPT,
      config: session.config,
      complete: createOpenAICompleter(session.config.OPENAI_API_KEY ?? ""),
    });

    sessionStore.update(sessionId, (s) => withSingleResult(s, result));

    return NextResponse.json({ result });
  } catch (err) {
    return errorResponse("POST /api/analyze", err);
  }
}
