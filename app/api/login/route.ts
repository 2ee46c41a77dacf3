// app/api/login/route.ts
import { NextRequest, NextResponse } from "next/server";
import { isAllowedUser } from "@/lib/auth";
import { readServerEnv } from "@/lib/env";
import { AppError } from "@/lib/errors";
import { errorResponse, readJsonBody, SESSION_COOKIE } from "@/lib/http";
import { createSessionId } from "@/lib/sessions";

export const runtime = "nodejs";

/**
 * POST /api/login
 * Body: { username: string }
 */
export async function POST(req: NextRequest) {
  try {
    const body = await readJsonBody(req);
    const username = typeof body.username === "string" ? body.username.trim() : "";

    if (!username) {
      throw new AppError("validation", "Please enter a username.");
    }

    const { allowedUsers } = readServerEnv();
    if (!isAllowedUser(username, allowedUsers)) {
      throw new AppError(
        "unauthorized",
        "Access denied. Username not found in allowed users list."
      );
    }

    const res = NextResponse.json({ username });
    res.cookies.set(SESSION_COOKIE, createSessionId(username), {
      httpOnly: true,
      sameSite: "lax",
      path: "/",
    });
    return res;
  } catch (err) {
    return errorResponse("POST /api/login", err);
  }
}
