// app/api/validate/route.ts
import { NextRequest, NextResponse } from "next/server";
import { AppError } from "@/lib/errors";
import { errorResponse, readJsonBody, requireSession, sessionStore } from "@/lib/http";
import { optionalJson } from "@/lib/json";
import { createOpenAICompleter } from "@/lib/openai";
import { withValidationResult } from "@/lib/sessions";
import type { JsonValue } from "@/lib/types";
import { buildValidationDownload, runValidation, summarizeInputs } from "@/lib/validation";

export const runtime = "nodejs";

/**
 * POST /api/validate
 * Body:
 * {
 *   inputJson: JSON;
 *   expectedJson: JSON;
 *   actualJson?: JSON;
 *   useSessionBatch?: boolean;  // take the actual output from this session's last batch
 *   template?: string;
 * }
 */
export async function POST(req: NextRequest) {
  try {
    const { sessionId, session } = await requireSession(req);
    const body = await readJsonBody(req);

    const inputJson = optionalJson(body.inputJson);
    const expectedJson = optionalJson(body.expectedJson);

    let actualJson: JsonValue | undefined;
    if (body.useSessionBatch === true) {
      if (!session.batchOutput) {
        throw new AppError(
          "validation",
          "No batch results from Company Analysis. Run a batch first, or upload a custom JSON file."
        );
      }
      actualJson = {
        generated_at: new Date().toISOString(),
        total_companies: session.batchOutput.results.length,
        results: session.batchOutput.results.map((r) => ({ ...r })),
      };
    } else {
      actualJson = optionalJson(body.actualJson);
    }

    const report = await runValidation({
      inputJson,
      expectedJson,
      actualJson,
      config: session.config,
      complete: createOpenAICompleter(session.config.OPENAI_API_KEY ?? ""),
      template: typeof body.template === "string" ? body.template : undefined,
    });

    sessionStore.update(sessionId, (s) => withValidationResult(s, report));

    return NextResponse.json({
      report,
      summaries: summarizeInputs(inputJson, expectedJson, actualJson),
      download: buildValidationDownload(report, inputJson, expectedJson, actualJson),
    });
  } catch (err) {
    return errorResponse("POST /api/validate", err);
  }
}
