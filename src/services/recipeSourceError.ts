export type RecipeSourceErrorCode =
  | "network_error"
  | "timeout"
  | "aborted"
  | "http_status"
  | "invalid_payload"
  | "missing_credentials";

export class RecipeSourceError extends Error {
  constructor(
    message: string,
    readonly code: RecipeSourceErrorCode,
    readonly status?: number
  ) {
    super(message);
    this.name = "RecipeSourceError";
  }

  /** Transient failures are worth one more request; empty results and bad payloads are not. */
  get retryable(): boolean {
    switch (this.code) {
      case "network_error":
      case "timeout":
        return true;
      case "http_status":
        return this.status === 429 || (this.status !== undefined && this.status >= 500);
      default:
        return false;
    }
  }
}

export function toRecipeSourceError(error: unknown): RecipeSourceError {
  if (error instanceof RecipeSourceError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new RecipeSourceError(message, "invalid_payload");
}
