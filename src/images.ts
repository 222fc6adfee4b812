/**
 * Replace remote WebP images in the manual with local PNG copies.
 * Typesetting engines cannot embed WebP, so the PDF step runs this first.
 */

import * as path from "node:path";
import PQueue from "p-queue";
import sharp from "sharp";
import { FetchError, errorMessage } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import type { FetchLike } from "./types.js";
import { fetchWithRetry, fileExists } from "./utils.js";

const WEBP_IMAGE_PATTERN = /!\[[^\]]*\]\((https?:\/\/[^)\s?]+?\.webp(?:\?[^)\s]*)?)\)/gi;

/** Images downloaded and re-encoded at the same time */
export const DEFAULT_IMAGE_CONCURRENCY = 4;

/**
 * Tracks image conversion results for one run.
 */
export interface ImageStats {
  /** Images downloaded and re-encoded */
  converted: number;
  /** Images whose local copy already existed */
  reused: number;
  /** Images that failed to download or decode */
  failed: number;
}

export interface RewriteImagesOptions {
  /** Directory the PNG copies are written to */
  imagesDir: string;
  /** Path prefix used in the rewritten Markdown (relative to the Markdown file) */
  linkPrefix?: string;
  /** Re-download images that already have a local copy */
  force?: boolean;
  fetchFn?: FetchLike;
  signal?: AbortSignal;
  logger?: Logger;
  /** Images downloaded and re-encoded at the same time */
  concurrency?: number;
}

export interface RewriteImagesResult {
  markdown: string;
  stats: ImageStats;
}

/**
 * List the distinct WebP image URLs referenced in a Markdown document.
 */
export function findWebpImages(markdown: string): string[] {
  const urls = new Set<string>();
  for (const match of markdown.matchAll(WEBP_IMAGE_PATTERN)) {
    urls.add(match[1]);
  }
  return [...urls];
}

/**
 * Local PNG filename for a remote image.
 *
 * @example
 * localImageName('https://cdn.example.com/img/Chart-1.webp?v=2') // 'Chart-1.png'
 */
export function localImageName(url: string): string {
  const basename = path.posix.basename(new URL(url).pathname);
  return `${basename.replace(/\.webp$/i, "")}.png`;
}

/**
 * Download an image and save it as PNG.
 *
 * @throws {FetchError} On download failure; sharp errors propagate for undecodable data
 */
async function convertImage(url: string, filepath: string, options: RewriteImagesOptions): Promise<void> {
  const response = await fetchWithRetry(url, { fetchFn: options.fetchFn, signal: options.signal });
  if (!response.ok) {
    throw new FetchError(`HTTP ${response.status} for ${url}`, "ERR_HTTP_ERROR", url, response.status);
  }
  const buffer = Buffer.from(await response.arrayBuffer());
  await sharp(buffer).png().toFile(filepath);
}

interface ImageTask {
  url: string;
  filename: string;
}

interface SkippedImage {
  url: string;
  reason: string;
}

/**
 * Pair each URL with its local filename. URLs without a usable filename, or
 * whose filename is already taken by an earlier URL, are skipped.
 */
function planImages(urls: readonly string[]): { tasks: ImageTask[]; skipped: SkippedImage[] } {
  const owners = new Set<string>();
  const tasks: ImageTask[] = [];
  const skipped: SkippedImage[] = [];

  for (const url of urls) {
    let filename: string;
    try {
      filename = localImageName(url);
    } catch (error) {
      skipped.push({ url, reason: errorMessage(error) });
      continue;
    }

    if (owners.has(filename)) {
      skipped.push({ url, reason: `${filename} is already used by another image` });
    } else {
      owners.add(filename);
      tasks.push({ url, filename });
    }
  }

  return { tasks, skipped };
}

/**
 * Convert every WebP image to a local PNG and point the Markdown at it.
 * Failed images keep their remote reference, and so do images whose local
 * filename is already used by another URL.
 */
export async function rewriteImages(markdown: string, options: RewriteImagesOptions): Promise<RewriteImagesResult> {
  const logger = options.logger ?? silentLogger;
  const linkPrefix = options.linkPrefix ?? "images";
  const stats: ImageStats = { converted: 0, reused: 0, failed: 0 };
  const localPaths = new Map<string, string>();

  const { tasks, skipped } = planImages(findWebpImages(markdown));

  for (const { url, reason } of skipped) {
    logger.warn(`Could not convert image ${url}: ${reason}`);
    stats.failed++;
  }

  const queue = new PQueue({ concurrency: options.concurrency ?? DEFAULT_IMAGE_CONCURRENCY });

  await Promise.all(
    tasks.map(({ url, filename }) =>
      queue.add(
        async () => {
          const filepath = path.join(options.imagesDir, filename);
          try {
            if (!options.force && (await fileExists(filepath))) {
              stats.reused++;
            } else {
              await convertImage(url, filepath, options);
              stats.converted++;
            }
            localPaths.set(url, `${linkPrefix}/${filename}`);
          } catch (error) {
            logger.warn(`Could not convert image ${url}: ${errorMessage(error)}`);
            stats.failed++;
          }
        },
        { throwOnTimeout: true },
      ),
    ),
  );

  // Only image references change; the URL is always the tail of the match
  const rewritten = markdown.replace(WEBP_IMAGE_PATTERN, (reference: string, url: string) => {
    const localPath = localPaths.get(url);
    return localPath ? `${reference.slice(0, -(url.length + 1))}${localPath})` : reference;
  });

  return { markdown: rewritten, stats };
}
