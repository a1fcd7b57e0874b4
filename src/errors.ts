import type { ErrorCode, ErrorDetail } from "./types.js";

export class ScrollPilotError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  toDetail(): ErrorDetail {
    return { code: this.code, message: this.message };
  }
}

export class ChannelError extends ScrollPilotError {}

export class ActuationError extends ScrollPilotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ADB_FAILED", message, options);
  }
}

export class ConfigError extends ScrollPilotError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Map any thrown value to an ErrorDetail, keeping the code of our own errors. */
export function toErrorDetail(e: unknown, fallback: ErrorCode): ErrorDetail {
  if (e instanceof ScrollPilotError) return e.toDetail();
  return { code: fallback, message: errorMessage(e) };
}
