/**
 * Build a single Markdown manual from the chapters listed on the index page.
 *
 * Chapter pages are read from the HTML cache or downloaded into it, converted
 * in index order, and assembled behind a table of contents.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse } from "node-html-parser";
import PQueue from "p-queue";
import { htmlToMarkdown } from "./convert.js";
import { FetchError } from "./errors.js";
import { filterUnwanted } from "./filter.js";
import { type Logger, type ProgressCallback, silentLogger } from "./logger.js";
import type { ChapterRecord, FetchLike, SiteProfile } from "./types.js";
import { fetchWithRetry, fileExists, resolveUrl, slug } from "./utils.js";

/** Chapters downloaded at the same time */
export const DEFAULT_FETCH_CONCURRENCY = 4;

const TOC_HEADING = "# Table of Contents";

export interface FetchPageOptions {
  fetchFn?: FetchLike;
  signal?: AbortSignal;
  /** Delay before the first retry (ms) */
  retryDelayMs?: number;
}

export interface LoadChapterOptions extends FetchPageOptions {
  /** Download even when a cached copy exists */
  force?: boolean;
  logger?: Logger;
}

export interface BuildManualOptions extends LoadChapterOptions {
  site: SiteProfile;
  /** Chapters downloaded at the same time */
  concurrency?: number;
  onProgress?: ProgressCallback;
}

/**
 * Download a page and return its raw bytes.
 *
 * @throws {FetchError} On network failure, timeout or a non-2xx status
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<Buffer> {
  const response = await fetchWithRetry(url, {
    fetchFn: options.fetchFn,
    signal: options.signal,
    baseDelayMs: options.retryDelayMs,
  });
  if (!response.ok) {
    throw new FetchError(`HTTP ${response.status} for ${url}`, "ERR_HTTP_ERROR", url, response.status);
  }
  return Buffer.from(await response.arrayBuffer());
}

/**
 * Cache filename for a chapter: zero-padded position plus the URL path.
 *
 * @example
 * cacheFileName(3, 'https://example.com/docs/language/arrays/') // '00003_docs_language_arrays.html'
 */
export function cacheFileName(orderIndex: number, sourceUrl: string): string {
  const pathname = new URL(sourceUrl).pathname;
  let safeName = pathname.replace(/^\/+|\/+$/g, "").replace(/\//g, "_");
  if (!safeName.endsWith(".html")) {
    safeName += ".html";
  }
  return `${String(orderIndex).padStart(5, "0")}_${safeName}`;
}

/**
 * Find every chapter linked from the index page, in document order.
 * Only `.page-link` anchors without a fragment count; duplicates are kept.
 */
export function discoverChapters(indexHtml: Buffer | string, site: SiteProfile, cacheDir: string): ChapterRecord[] {
  const root = parse(indexHtml.toString(), { comment: false });
  const chapters: ChapterRecord[] = [];

  for (const anchor of root.querySelectorAll("a.page-link")) {
    const href = anchor.getAttribute("href");
    if (!href || href.includes("#")) continue;

    const sourceUrl = resolveUrl(href, site.baseUrl);
    if (!sourceUrl) continue;

    const orderIndex = chapters.length + 1;
    const title = anchor.text.trim();
    chapters.push({
      orderIndex,
      sourceUrl,
      title,
      anchorSlug: slug(title),
      cachedPath: path.join(cacheDir, cacheFileName(orderIndex, sourceUrl)),
    });
  }

  return chapters;
}

/**
 * Return a chapter's raw HTML, downloading it into the cache when missing
 * (or always, with `force`).
 */
export async function loadChapterHtml(chapter: ChapterRecord, options: LoadChapterOptions = {}): Promise<Buffer> {
  const logger = options.logger ?? silentLogger;

  if (!options.force && (await fileExists(chapter.cachedPath))) {
    logger.info(`Using cached HTML for ${chapter.title}`);
    return fs.readFile(chapter.cachedPath);
  }

  logger.info(`Downloading chapter: ${chapter.sourceUrl}`);
  const html = await fetchPage(chapter.sourceUrl, options);
  await fs.writeFile(chapter.cachedPath, html);
  return html;
}

/**
 * Generate the table of contents entries, one per chapter.
 *
 * @example
 * buildToc([{ title: 'Arrays', anchorSlug: 'arrays', ... }]) // ['- [Arrays](#arrays)']
 */
export function buildToc(chapters: readonly ChapterRecord[]): string[] {
  return chapters.map((chapter) => `- [${chapter.title}](#${chapter.anchorSlug})`);
}

async function loadAll(chapters: readonly ChapterRecord[], options: BuildManualOptions): Promise<Buffer[]> {
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  options.signal?.addEventListener("abort", onAbort, { once: true });

  const queue = new PQueue({ concurrency: options.concurrency ?? DEFAULT_FETCH_CONCURRENCY });

  try {
    return await Promise.all(
      chapters.map((chapter) =>
        queue.add(() => loadChapterHtml(chapter, { ...options, signal: controller.signal }), {
          throwOnTimeout: true,
        }),
      ),
    );
  } catch (error) {
    // Drop pending chapters and cancel in-flight ones
    queue.clear();
    controller.abort();
    throw error;
  } finally {
    options.signal?.removeEventListener("abort", onAbort);
  }
}

/**
 * Load, convert and assemble every chapter into one Markdown document.
 *
 * @throws {FetchError} If any chapter cannot be downloaded
 */
export async function buildManual(chapters: readonly ChapterRecord[], options: BuildManualOptions): Promise<string> {
  const pages = await loadAll(chapters, options);

  const fragments = chapters.map((chapter, i) => {
    const markdown = htmlToMarkdown(pages[i], { site: options.site, pageUrl: chapter.sourceUrl });
    options.onProgress?.(i + 1, chapters.length, chapter.title);
    return markdown;
  });

  const toc = `${TOC_HEADING}\n\n${buildToc(chapters).join("\n")}\n\n`;
  return filterUnwanted(toc + fragments.join("\n\n"));
}
