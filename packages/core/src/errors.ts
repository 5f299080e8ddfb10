import { SERVICE_UNAVAILABLE_MESSAGE } from "./constants.js";

export type ErrorCode =
  | "EMBEDDING_UNAVAILABLE"
  | "GENERATION_UNAVAILABLE"
  | "INDEX_UNAVAILABLE"
  | "INVALID_REQUEST"
  | "INVALID_VERSION_FILTER"
  | "INGESTION_FAILED"
  | "CONFIG_INVALID";

export class CiteQaError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class EmbeddingUnavailableError extends CiteQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EMBEDDING_UNAVAILABLE", message, options);
  }
}

export class GenerationUnavailableError extends CiteQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GENERATION_UNAVAILABLE", message, options);
  }
}

export class IndexUnavailableError extends CiteQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INDEX_UNAVAILABLE", message, options);
  }
}

export class InvalidRequestError extends CiteQaError {
  constructor(message: string, code: "INVALID_REQUEST" | "INVALID_VERSION_FILTER" = "INVALID_REQUEST") {
    super(code, message);
  }
}

export class InvalidVersionFilterError extends InvalidRequestError {
  constructor(version: string) {
    super(`Invalid version filter: "${version}"`, "INVALID_VERSION_FILTER");
  }
}

export class IngestionError extends CiteQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INGESTION_FAILED", message, options);
  }
}

export class ConfigError extends CiteQaError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

export function isInfrastructureError(err: unknown): boolean {
  return (
    err instanceof EmbeddingUnavailableError ||
    err instanceof GenerationUnavailableError ||
    err instanceof IndexUnavailableError
  );
}

/** Message safe to show to an end user for a failed request. */
export function toUserMessage(err: unknown): string {
  if (err instanceof InvalidRequestError || err instanceof IngestionError) return err.message;
  return SERVICE_UNAVAILABLE_MESSAGE;
}
