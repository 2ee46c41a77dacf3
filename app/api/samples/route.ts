// app/api/samples/route.ts
import { NextRequest, NextResponse } from "next/server";
import { readServerEnv } from "@/lib/env";
import { AppError } from "@/lib/errors";
import { errorResponse, requireSession } from "@/lib/http";
import { isSampleKind, loadSampleJson, SAMPLE_FILES } from "@/lib/samples";

export const runtime = "nodejs";

/**
 * GET /api/samples?kind=input|expected
 */
export async function GET(req: NextRequest) {
  try {
    await requireSession(req);

    const kind = req.nextUrl.searchParams.get("kind");
    if (!isSampleKind(kind)) {
      throw new AppError("validation", "kind must be 'input' or 'expected'");
    }

    const data = await loadSampleJson(readServerEnv().sampleDataDir, kind);
    return NextResponse.json({ kind, file: SAMPLE_FILES[kind], data });
  } catch (err) {
    return errorResponse("GET /api/samples", err);
  }
}
