import type { RetrievalErrorKind } from "./download.model";

export type UploadErrorKind = "quota" | "network_error" | "unknown";
export type DeliveryErrorKind = "transport_rejected" | "recipient_unreachable";
export type PersistenceErrorKind = "write_failed";

/**
 * Failure of the retrieval backend, already mapped to one of the
 * categories the orchestrator understands.
 */
export class RetrievalError extends Error {
  constructor(
    public readonly kind: RetrievalErrorKind,
    public readonly detail: string,
  ) {
    super(`${kind}: ${detail}`);
    this.name = "RetrievalError";
  }

  /** Failures that another attempt could plausibly fix. */
  isTransient(): boolean {
    return this.kind === "network_error" || this.kind === "unknown";
  }
}

export class UploadError extends Error {
  constructor(
    public readonly kind: UploadErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "UploadError";
  }
}

export class DeliveryError extends Error {
  constructor(
    public readonly kind: DeliveryErrorKind,
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = "DeliveryError";
  }
}

export class PersistenceError extends Error {
  public readonly kind: PersistenceErrorKind = "write_failed";

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "PersistenceError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
