// app/api/batch/route.ts
import { NextRequest } from "next/server";
import { runBatch } from "@/lib/analysis";
import { encodeBatchEvent, type BatchEvent } from "@/lib/batchStream";
import { hasApiKey } from "@/lib/config";
import { AppError, errorMessage } from "@/lib/errors";
import { errorResponse, readJsonBody, requireSession, sessionStore } from "@/lib/http";
import { createOpenAICompleter } from "@/lib/openai";
import { DEFAULT_ANALYSIS_PROMPT } from "@/lib/prompt";
import { withBatchOutput } from "@/lib/sessions";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

/**
 * POST /api/batch
 * Body: { companies: unknown[]; template?: string }
 *
 * Streams NDJSON: one "progress" line per processed company, then a
 * single "done" line with the batch output (or an "error" line).
 */
export async function POST(req: NextRequest) {
  let context: Awaited<ReturnType<typeof requireSession>>;
  let body: Record<string, unknown>;

  try {
    context = await requireSession(req);
    body = await readJsonBody(req);

    // Fail before streaming so the client gets a plain JSON error.
    if (!Array.isArray(body.companies)) {
      throw new AppError("validation", "JSON file must contain an array of companies");
    }
    if (!hasApiKey(context.session.config)) {
      throw new AppError("validation", "Please configure your OpenAI API key in Settings");
    }
  } catch (err) {
    return errorResponse("POST /api/batch", err);
  }

  const { sessionId, session } = context;
  const companies = body.companies;
  const template =
    typeof body.template === "string" ? body.template : DEFAULT_ANALYSIS_PROMPT;

  const encoder = new TextEncoder();

  const stream = new ReadableStream<Uint8Array>({
    async start(controller) {
      const send = (event: BatchEvent) => {
        controller.enqueue(encoder.encode(encodeBatchEvent(event)));
      };

      try {
        const output = await runBatch({
          companies,
          template,
          config: session.config,
          complete: createOpenAICompleter(session.config.OPENAI_API_KEY ?? ""),
          onProgress: (progress) => send({ type: "progress", progress }),
        });

        sessionStore.update(sessionId, (s) => withBatchOutput(s, output));
        send({ type: "done", output });
      } catch (err) {
        console.error("Error in POST /api/batch stream:", err);
        send({
          type: "error",
          error: errorMessage(err),
          kind: err instanceof AppError ? err.kind : undefined,
        });
      } finally {
        controller.close();
      }
    },
  });

  return new Response(stream, {
    headers: {
      "Content-Type": "application/x-ndjson; charset=utf-8",
      "Cache-Control": "no-cache, no-transform",
    },
  });
}
