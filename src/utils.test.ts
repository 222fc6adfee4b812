import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { FetchError } from "./errors.js";
import type { FetchLike } from "./types.js";
import {
  DEFAULT_USER_AGENT,
  fetchWithRetry,
  fileExists,
  hasFlag,
  hasHelpFlag,
  hasScheme,
  onInterrupt,
  resolveUrl,
  setupSignalHandlers,
  slug,
} from "./utils.js";

describe("slug", () => {
  it("lower-cases and hyphenates spaces", () => {
    expect(slug("Hello World")).toBe("hello-world");
  });

  it("strips characters outside letters, digits, whitespace and hyphens", () => {
    expect(slug("Chapter 1: Introduction!")).toBe("chapter-1-introduction");
    expect(slug("Type system (v6)")).toBe("type-system-v6");
  });

  it("turns each whitespace character into its own hyphen", () => {
    expect(slug("Arrays & maps")).toBe("arrays--maps");
    expect(slug("a\tb")).toBe("a-b");
  });

  it("trims surrounding whitespace before hyphenating", () => {
    expect(slug("  Loops  ")).toBe("loops");
  });

  it("drops non-ASCII letters", () => {
    expect(slug("Café")).toBe("caf");
  });

  it("returns empty string for empty input", () => {
    expect(slug("")).toBe("");
    expect(slug("???")).toBe("");
  });

  it("is idempotent on its own output", () => {
    for (const input of ["Hello World", "Arrays & maps", "-already-slugged-", "Version 6.1 notes"]) {
      const once = slug(input);
      expect(slug(once)).toBe(once);
    }
  });

  it("is deterministic", () => {
    expect(slug("Strategies")).toBe(slug("Strategies"));
  });
});

describe("resolveUrl", () => {
  const baseUrl = "https://example.com";

  it("returns absolute URLs unchanged", () => {
    expect(resolveUrl("https://other.com/page", baseUrl)).toBe("https://other.com/page");
  });

  it("resolves root-relative URLs", () => {
    expect(resolveUrl("/docs/intro/", baseUrl)).toBe("https://example.com/docs/intro/");
    expect(resolveUrl("/page", "https://example.com/dir/page.html")).toBe("https://example.com/page");
  });

  it("resolves document-relative URLs", () => {
    expect(resolveUrl("arrays/", "https://example.com/docs/language/")).toBe(
      "https://example.com/docs/language/arrays/",
    );
    expect(resolveUrl("../page", "https://example.com/dir/sub/")).toBe("https://example.com/dir/page");
  });

  it("keeps fragments", () => {
    expect(resolveUrl("/docs/intro/#setup", baseUrl)).toBe("https://example.com/docs/intro/#setup");
  });

  it("returns null for invalid URLs", () => {
    expect(resolveUrl("", "not-a-url")).toBeNull();
    expect(resolveUrl("http://", baseUrl)).toBeNull();
  });
});

describe("hasScheme", () => {
  it("detects URLs with a scheme", () => {
    expect(hasScheme("https://example.com")).toBe(true);
    expect(hasScheme("mailto:docs@example.com")).toBe(true);
  });

  it("rejects relative and protocol-relative URLs", () => {
    expect(hasScheme("/docs/intro/")).toBe(false);
    expect(hasScheme("arrays/")).toBe(false);
    expect(hasScheme("//cdn.example.com/a.png")).toBe(false);
    expect(hasScheme("#setup")).toBe(false);
  });
});

describe("hasHelpFlag", () => {
  it("detects --help and -h", () => {
    expect(hasHelpFlag(["--help"])).toBe(true);
    expect(hasHelpFlag(["--pdf", "-h"])).toBe(true);
    expect(hasHelpFlag(["--pdf"])).toBe(false);
  });
});

describe("hasFlag", () => {
  it("detects an exact flag", () => {
    expect(hasFlag(["--pdf", "--force"], "--force")).toBe(true);
    expect(hasFlag(["--forced"], "--force")).toBe(false);
    expect(hasFlag([], "--pdf")).toBe(false);
  });
});

describe("fileExists", () => {
  it("reports existing and missing files", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "manual-utils-"));
    try {
      const file = path.join(dir, "page.html");
      await fs.writeFile(file, "<p>cached</p>");

      expect(await fileExists(file)).toBe(true);
      expect(await fileExists(path.join(dir, "missing.html"))).toBe(false);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});

describe("fetchWithRetry", () => {
  const url = "https://example.com/docs/intro/";

  it("returns the response and sends the user agent", async () => {
    const fetchFn = vi.fn<FetchLike>().mockResolvedValue(new Response("ok"));

    const response = await fetchWithRetry(url, { fetchFn });

    expect(await response.text()).toBe("ok");
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn).toHaveBeenCalledWith(
      url,
      expect.objectContaining({ headers: { "User-Agent": DEFAULT_USER_AGENT } }),
    );
  });

  it("retries server errors until a response succeeds", async () => {
    const fetchFn = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(new Response("busy", { status: 503 }))
      .mockResolvedValueOnce(new Response("ok", { status: 200 }));

    const response = await fetchWithRetry(url, { fetchFn, baseDelayMs: 0 });

    expect(response.status).toBe(200);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("returns the last server error once retries are exhausted", async () => {
    const fetchFn = vi.fn<FetchLike>().mockImplementation(async () => new Response("down", { status: 500 }));

    const response = await fetchWithRetry(url, { fetchFn, retries: 2, baseDelayMs: 0 });

    expect(response.status).toBe(500);
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it("does not retry client errors", async () => {
    const fetchFn = vi.fn<FetchLike>().mockResolvedValue(new Response("missing", { status: 404 }));

    const response = await fetchWithRetry(url, { fetchFn, baseDelayMs: 0 });

    expect(response.status).toBe(404);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("retries network errors and then fails with ERR_NETWORK", async () => {
    const fetchFn = vi.fn<FetchLike>().mockRejectedValue(new TypeError("fetch failed"));

    const error = await fetchWithRetry(url, { fetchFn, retries: 1, baseDelayMs: 0 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ code: "ERR_NETWORK", url });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("times out a hanging request", async () => {
    const fetchFn: FetchLike = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });

    await expect(fetchWithRetry(url, { fetchFn, retries: 0, timeoutMs: 10 })).rejects.toMatchObject({
      code: "ERR_TIMEOUT",
    });
  });

  it("does not fetch when the signal is already aborted", async () => {
    const fetchFn = vi.fn<FetchLike>();
    const controller = new AbortController();
    controller.abort();

    await expect(fetchWithRetry(url, { fetchFn, signal: controller.signal })).rejects.toMatchObject({
      code: "ERR_ABORTED",
    });
    expect(fetchFn).not.toHaveBeenCalled();
  });
});

describe("onInterrupt", () => {
  const signals = ["SIGINT", "SIGTERM"] as const;

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs registered cleanups on SIGTERM and skips unregistered ones", async () => {
    const existing = new Set<unknown>(signals.flatMap((signal) => process.listeners(signal)));
    const exit = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);
    vi.spyOn(console, "log").mockImplementation(() => {});
    const kept = vi.fn();
    const dropped = vi.fn();

    const removeKept = onInterrupt(kept);
    const removeDropped = onInterrupt(dropped);
    removeDropped();
    setupSignalHandlers("Manual build");

    try {
      process.emit("SIGTERM", "SIGTERM");

      await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(143));
      expect(kept).toHaveBeenCalledTimes(1);
      expect(dropped).not.toHaveBeenCalled();
    } finally {
      removeKept();
      for (const signal of signals) {
        for (const listener of process.listeners(signal)) {
          if (!existing.has(listener)) process.removeListener(signal, listener);
        }
      }
    }
  });
});
