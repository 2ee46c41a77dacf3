// app/api/session/route.ts
import { NextRequest, NextResponse } from "next/server";
import { describeConfig } from "@/lib/config";
import { errorResponse, requireSession } from "@/lib/http";

export const runtime = "nodejs";

/**
 * GET /api/session
 * Everything the dashboard needs to restore itself after a reload.
 */
export async function GET(req: NextRequest) {
  try {
    const { session } = await requireSession(req);

    return NextResponse.json({
      username: session.username,
      config: describeConfig(session.config),
      configSource: session.configSource,
      lastResult: session.lastResult,
      batchOutput: session.batchOutput,
      validationResult: session.validationResult,
    });
  } catch (err) {
    return errorResponse("GET /api/session", err);
  }
}
