// lib/errors.ts

export type ErrorKind = "validation" | "unauthorized" | "io" | "remote" | "prompt_format";

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  validation: 400,
  unauthorized: 401,
  prompt_format: 422,
  io: 500,
  remote: 502,
};

export class AppError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AppError";
    this.kind = kind;
  }

  get status(): number {
    return STATUS_BY_KIND[this.kind];
  }
}

export class PromptFormatError extends AppError {
  constructor(message: string) {
    super("prompt_format", `Prompt formatting error: ${message}`);
    this.name = "PromptFormatError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "Unknown error";
}

/**
 * Wrap anything thrown by the completion client so routes can tell it apart
 * from our own validation errors.
 */
export function toRemoteError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  return new AppError("remote", errorMessage(err), { cause: err });
}

export function isNodeErrorWithCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
