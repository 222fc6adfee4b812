/** Error codes attached to a FetchError */
export type FetchErrorCode = "ERR_HTTP_ERROR" | "ERR_TIMEOUT" | "ERR_ABORTED" | "ERR_NETWORK";

/**
 * Raised when the index page, a chapter or an image cannot be downloaded.
 */
export class FetchError extends Error {
  /** What went wrong (HTTP status, timeout, abort, network). */
  public readonly code: FetchErrorCode;
  /** URL that was being fetched. */
  public readonly url: string;
  /** HTTP status code, if relevant. */
  public readonly statusCode?: number;
  /** The original error object, if available. */
  public readonly originalError?: Error;

  constructor(message: string, code: FetchErrorCode, url: string, statusCode?: number, originalError?: Error) {
    super(message);
    this.name = "FetchError";
    this.code = code;
    this.url = url;
    this.statusCode = statusCode;
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FetchError);
    }
  }
}

/**
 * Turn any thrown value into a one-line message for logs.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
