// lib/sessions.ts
import type {
  AnalysisResult,
  BatchOutput,
  Configuration,
  ConfigSource,
  ValidationReport,
} from "./types";
import { resolveConfig, type ConfigProvider } from "./config";

export interface DecodedSessionId {
  username: string;
  issuedAt: number;
}

/**
 * Base64url-safe encode: no '+', '/', '=' so it's safe in cookies and file names.
 */
export function base64UrlEncode(input: string): string {
  const base64 = Buffer.from(input, "utf8").toString("base64");
  return base64
    .replace(/\+/g, "-")
    .replace(/\//g, "_")
    .replace(/=+$/g, ""); // strip trailing '='
}

/**
 * Reverse of base64UrlEncode.
 */
export function base64UrlDecode(input: string): string {
  let base64 = input.replace(/-/g, "+").replace(/_/g, "/");
  // pad with '=' to length multiple of 4
  const pad = 4 - (base64.length % 4);
  if (pad !== 4) {
    base64 += "=".repeat(pad);
  }
  return Buffer.from(base64, "base64").toString("utf8");
}

export function createSessionId(username: string, issuedAt = Date.now()): string {
  const payload = JSON.stringify({ username, issuedAt });
  return base64UrlEncode(payload);
}

/**
 * Reverse of createSessionId. Returns null for anything we did not issue.
 */
export function decodeSessionId(sessionId: string): DecodedSessionId | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(base64UrlDecode(sessionId));
  } catch {
    return null;
  }

  if (
    typeof parsed !== "object" ||
    parsed === null ||
    !("username" in parsed) ||
    !("issuedAt" in parsed) ||
    typeof parsed.username !== "string" ||
    typeof parsed.issuedAt !== "number" ||
    !parsed.username
  ) {
    return null;
  }

  return { username: parsed.username, issuedAt: parsed.issuedAt };
}

// --- Session state ---

export interface SessionState {
  username: string;
  config: Configuration;
  configSource: ConfigSource;
  lastResult: AnalysisResult | null;
  batchOutput: BatchOutput | null;
  validationResult: ValidationReport | null;
}

export function createSessionState(
  username: string,
  config: Configuration,
  configSource: ConfigSource
): SessionState {
  return {
    username,
    config,
    configSource,
    lastResult: null,
    batchOutput: null,
    validationResult: null,
  };
}

export function withConfig(state: SessionState, config: Configuration): SessionState {
  return { ...state, config };
}

export function withSingleResult(
  state: SessionState,
  result: AnalysisResult
): SessionState {
  return { ...state, lastResult: result };
}

export function withBatchOutput(state: SessionState, output: BatchOutput): SessionState {
  return { ...state, batchOutput: output };
}

export function withValidationResult(
  state: SessionState,
  report: ValidationReport
): SessionState {
  return { ...state, validationResult: report };
}

/**
 * Process-wide session map. Last write wins; a session lives until logout or restart.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();

  get(sessionId: string): SessionState | undefined {
    return this.sessions.get(sessionId);
  }

  put(sessionId: string, state: SessionState): SessionState {
    this.sessions.set(sessionId, state);
    return state;
  }

  /**
   * Apply a transition to the current state. A session removed in the
   * meantime stays removed.
   */
  update(
    sessionId: string,
    transition: (state: SessionState) => SessionState
  ): SessionState | undefined {
    const current = this.sessions.get(sessionId);
    if (!current) return undefined;
    return this.put(sessionId, transition(current));
  }

  delete(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}

/**
 * Fetch the session, resolving configuration the first time it is seen.
 */
export async function loadSession(
  store: SessionStore,
  sessionId: string,
  username: string,
  providers: ConfigProvider[]
): Promise<SessionState> {
  const existing = store.get(sessionId);
  if (existing) return existing;

  const { config, source } = await resolveConfig(providers);
  return store.put(sessionId, createSessionState(username, config, source));
}
