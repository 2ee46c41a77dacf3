// app/api/logout/route.ts
import { NextRequest, NextResponse } from "next/server";
import { SESSION_COOKIE, sessionStore } from "@/lib/http";

export const runtime = "nodejs";

export async function POST(req: NextRequest) {
  const sessionId = req.cookies.get(SESSION_COOKIE)?.value;
  if (sessionId) sessionStore.delete(sessionId);

  const res = NextResponse.json({ ok: true });
  res.cookies.delete(SESSION_COOKIE);
  return res;
}
