/**
 * Utility functions for the manual builder
 * Extracted for testability
 */

import * as fs from "node:fs/promises";
import { FetchError, errorMessage } from "./errors.js";
import type { FetchLike } from "./types.js";

/** Callback for cleanup actions when process is interrupted */
type CleanupCallback = () => void | Promise<void>;

/** Registered cleanup callbacks for SIGINT handling */
const cleanupCallbacks: CleanupCallback[] = [];

/** Flag to prevent multiple SIGINT handlers from running */
let isExiting = false;

/**
 * Desktop Chrome user agent sent with every request.
 * Some documentation hosts answer bare clients with a reduced page.
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

// Fetch defaults (in ms)
export const DEFAULT_FETCH_TIMEOUT = 30000;
export const DEFAULT_RETRY_DELAY = 500;
export const DEFAULT_RETRIES = 3;

/**
 * Register a cleanup callback to be called when the process receives SIGINT.
 * Multiple callbacks can be registered and will be called in order.
 *
 * @param callback - Async or sync function to call during cleanup
 * @returns Function that unregisters the callback
 */
export function onInterrupt(callback: CleanupCallback): () => void {
  cleanupCallbacks.push(callback);
  return () => {
    const index = cleanupCallbacks.indexOf(callback);
    if (index !== -1) {
      cleanupCallbacks.splice(index, 1);
    }
  };
}

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Manual build")
 */
export function setupSignalHandlers(commandName: string): void {
  const handler = async (signal: NodeJS.Signals) => {
    if (isExiting) return;
    isExiting = true;

    console.log(`\n${commandName} interrupted.`);

    for (const callback of cleanupCallbacks) {
      try {
        await callback();
      } catch (error) {
        console.error(`Cleanup failed: ${errorMessage(error)}`);
      }
    }

    // 128 + signal number (SIGINT = 2, SIGTERM = 15)
    const exitCode = signal === "SIGINT" ? 130 : 143;
    process.exit(exitCode);
  };

  process.on("SIGINT", () => void handler("SIGINT"));
  process.on("SIGTERM", () => void handler("SIGTERM"));
}

/**
 * Convert heading or title text to an in-document anchor.
 * Keeps ASCII letters, digits, whitespace and hyphens, then turns every
 * whitespace character into a hyphen.
 *
 * @example
 * slug('Hello World') // 'hello-world'
 * slug('Arrays & maps') // 'arrays--maps'
 */
export function slug(text: string): string {
  return text
    .replace(/[^0-9a-zA-Z\s-]/g, "")
    .trim()
    .toLowerCase()
    .replace(/\s/g, "-");
}

/**
 * Resolve a possibly relative URL against a base URL.
 *
 * @returns Absolute URL, or null if it cannot be parsed
 *
 * @example
 * resolveUrl('/page', 'https://example.com/dir/') // 'https://example.com/page'
 * resolveUrl('page', 'https://example.com/dir/') // 'https://example.com/dir/page'
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return null;
  }
}

/** True for hrefs that carry their own scheme (https:, mailto:, ...) */
export function hasScheme(href: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(href);
}

/**
 * Wait for specified milliseconds.
 *
 * @param ms - Duration to wait in milliseconds
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Check whether a file exists and is accessible.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export interface FetchRetryOptions {
  /** Fetch implementation (defaults to the global fetch) */
  fetchFn?: FetchLike;
  /** Extra attempts after the first one */
  retries?: number;
  /** Delay before the first retry; doubles on every further retry (ms) */
  baseDelayMs?: number;
  /** Per-attempt timeout (ms) */
  timeoutMs?: number;
  /** Aborts the request and every pending retry */
  signal?: AbortSignal;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

async function fetchOnce(url: string, fetchFn: FetchLike, timeoutMs: number, signal?: AbortSignal): Promise<Response> {
  if (signal?.aborted) {
    throw new FetchError(`Fetch aborted: ${url}`, "ERR_ABORTED", url);
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    return await fetchFn(url, {
      headers: { "User-Agent": DEFAULT_USER_AGENT },
      signal: controller.signal,
    });
  } catch (error) {
    const original = error instanceof Error ? error : undefined;
    if (timedOut) {
      throw new FetchError(`Timed out after ${timeoutMs} ms: ${url}`, "ERR_TIMEOUT", url, undefined, original);
    }
    if (signal?.aborted) {
      throw new FetchError(`Fetch aborted: ${url}`, "ERR_ABORTED", url, undefined, original);
    }
    throw new FetchError(`Network error for ${url}: ${errorMessage(error)}`, "ERR_NETWORK", url, undefined, original);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}

/**
 * Fetch a URL with a per-attempt timeout and exponential backoff.
 * Network errors, timeouts, 429 and 5xx responses are retried; any other
 * response is returned as is, so callers still check `response.ok`.
 *
 * @throws {FetchError} When every attempt failed or the signal was aborted
 */
export async function fetchWithRetry(url: string, options: FetchRetryOptions = {}): Promise<Response> {
  const {
    fetchFn = fetch,
    retries = DEFAULT_RETRIES,
    baseDelayMs = DEFAULT_RETRY_DELAY,
    timeoutMs = DEFAULT_FETCH_TIMEOUT,
    signal,
  } = options;

  let lastError: FetchError | undefined;

  for (let attempt = 0; attempt <= retries; attempt++) {
    if (attempt > 0) {
      await delay(baseDelayMs * 2 ** (attempt - 1));
    }

    try {
      const response = await fetchOnce(url, fetchFn, timeoutMs, signal);
      if (!isRetryableStatus(response.status) || attempt === retries) {
        return response;
      }
      await response.body?.cancel();
      lastError = new FetchError(`HTTP ${response.status} for ${url}`, "ERR_HTTP_ERROR", url, response.status);
    } catch (error) {
      if (!(error instanceof FetchError) || error.code === "ERR_ABORTED") {
        throw error;
      }
      lastError = error;
    }
  }

  throw lastError ?? new FetchError(`Failed to fetch ${url}`, "ERR_NETWORK", url);
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Check if a boolean flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--pdf')
 */
export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}
