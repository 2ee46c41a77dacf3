// lib/http.ts
import { NextRequest, NextResponse } from "next/server";
import { defaultProviders } from "./configProviders";
import { readServerEnv, type ServerEnv } from "./env";
import { AppError, errorMessage } from "./errors";
import { isAllowedUser } from "./auth";
import { decodeSessionId, loadSession, SessionStore, type SessionState } from "./sessions";

export const SESSION_COOKIE = "hs_session";

// One store per server process.
export const sessionStore = new SessionStore();

export type SessionContext = {
  sessionId: string;
  session: SessionState;
  env: ServerEnv;
};

export async function requireSession(req: NextRequest): Promise<SessionContext> {
  const env = readServerEnv();
  const sessionId = req.cookies.get(SESSION_COOKIE)?.value;
  const decoded = sessionId ? decodeSessionId(sessionId) : null;

  if (!sessionId || !decoded || !isAllowedUser(decoded.username, env.allowedUsers)) {
    throw new AppError("unauthorized", "Please log in to use the dashboard");
  }

  const session = await loadSession(
    sessionStore,
    sessionId,
    decoded.username,
    defaultProviders(env, decoded.username)
  );

  return { sessionId, session, env };
}

export function errorResponse(route: string, err: unknown) {
  if (err instanceof AppError) {
    if (err.kind === "io" || err.kind === "remote") {
      console.error(`Error in ${route}:`, err);
    }
    return NextResponse.json({ error: err.message, kind: err.kind }, { status: err.status });
  }

  console.error(`Error in ${route}:`, err);
  return NextResponse.json(
    { error: errorMessage(err) || `Unknown error in ${route}` },
    { status: 500 }
  );
}

/**
 * Parse a JSON request body, reporting a malformed one as a validation error.
 */
export async function readJsonBody(req: NextRequest): Promise<Record<string, unknown>> {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    throw new AppError("validation", "Request body must be valid JSON");
  }
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    throw new AppError("validation", "Request body must be a JSON object");
  }
  return { ...body };
}
