/**
 * Error taxonomy for a conversational turn.
 *
 * DeviceError and SynthesisPipeError are fatal to the current turn. BackendError is raised only when
 * every attempted completion candidate failed. QuotaOrAuthError is never surfaced to the operator as a
 * crash; the completion race turns it into an advisory fragment.
 */

export type PipelineErrorCode =
  | "DEVICE_UNAVAILABLE"
  | "BACKEND_FAILED"
  | "QUOTA_OR_AUTH"
  | "SYNTHESIS_PIPE_BROKEN"
  | "STT_FAILED"
  | "INVALID_CONFIG";

export class PipelineError extends Error {
  constructor(
    message: string,
    readonly code: PipelineErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DeviceError extends PipelineError {
  constructor(message: string, readonly device: string, options?: { cause?: unknown }) {
    super(message, "DEVICE_UNAVAILABLE", options);
  }
}

export class BackendError extends PipelineError {
  constructor(message: string, readonly candidates: string[], options?: { cause?: unknown }) {
    super(message, "BACKEND_FAILED", options);
  }
}

export class QuotaOrAuthError extends PipelineError {
  constructor(message: string, readonly candidate: string, options?: { cause?: unknown }) {
    super(message, "QUOTA_OR_AUTH", options);
  }
}

export class SynthesisPipeError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "SYNTHESIS_PIPE_BROKEN", options);
  }
}

export class SttError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "STT_FAILED", options);
  }
}

export class ConfigError extends PipelineError {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`, "INVALID_CONFIG");
  }
}

const QUOTA_OR_AUTH_STATUS = new Set([401, 403, 429]);

/** Whole-word markers only, so a "401" inside a longer number or id does not count. */
const QUOTA_OR_AUTH_MESSAGE =
  /\b(?:401|403|429)\b|\btoo many requests\b|\brate[- _]?limit|\bunauthori[sz]ed\b|\bforbidden\b|\binvalid[ _]api[ _]key\b|\binsufficient_quota\b/i;

function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  return typeof err.status === "number" ? err.status : undefined;
}

/** Rate-limit, quota and credential failures from a completion backend. An HTTP status decides on its own. */
export function isQuotaOrAuthError(err: unknown): boolean {
  if (err instanceof QuotaOrAuthError) return true;
  const status = statusOf(err);
  if (status !== undefined) return QUOTA_OR_AUTH_STATUS.has(status);
  return QUOTA_OR_AUTH_MESSAGE.test(err instanceof Error ? err.message : String(err));
}

/** What a backend rethrows: QuotaOrAuthError for that class of failure, the original error otherwise. */
export function classifyBackendError(err: unknown, candidate: string): Error {
  if (err instanceof QuotaOrAuthError) return err;
  const e = toError(err);
  return isQuotaOrAuthError(e) ? new QuotaOrAuthError(e.message, candidate, { cause: e }) : e;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
