#!/usr/bin/env node
/**
 * Download the manual and combine it into a single Markdown file (and optional PDF).
 *
 * Usage: npm run manual [-- --pdf] [--force]
 */

import { realpathSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { errorMessage } from "./errors.js";
import { rewriteImages } from "./images.js";
import { consoleLogger, progressBar } from "./logger.js";
import { buildManual, discoverChapters, fetchPage } from "./manual.js";
import { exportPdf } from "./pdf.js";
import { DEFAULT_SITE } from "./site.js";
import { hasFlag, hasHelpFlag, onInterrupt, setupSignalHandlers } from "./utils.js";

const OUTPUT_DIR = "output";
const CACHE_DIR = path.join(OUTPUT_DIR, "html");
const IMAGES_DIR = path.join(OUTPUT_DIR, "images");
const MANUAL_FILE = path.join(OUTPUT_DIR, "manual.md");
const PDF_FILE = path.join(OUTPUT_DIR, "manual.pdf");

export interface CliOptions {
  /** Also render the Markdown to PDF */
  pdf: boolean;
  /** Re-download cached chapters and images */
  force: boolean;
  showHelp: boolean;
}

/**
 * Format duration in milliseconds to human-readable string
 * Exported for testing
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

/**
 * Print usage information.
 */
function showUsage(): void {
  console.log("Usage: npm run manual [-- --pdf] [--force]");
  console.log("");
  console.log("Download every chapter of the manual and combine them into one Markdown file.");
  console.log("");
  console.log("Options:");
  console.log("  --pdf                Also convert the Markdown to PDF (requires pandoc; qpdf optional)");
  console.log("  --force              Re-download chapters and images that are already cached");
  console.log("  --help, -h           Show this help message");
}

/**
 * Parse command line arguments
 * Exported for testing
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  return {
    pdf: hasFlag(args, "--pdf"),
    force: hasFlag(args, "--force"),
    showHelp: hasHelpFlag(args),
  };
}

export async function main(): Promise<void> {
  const { pdf, force, showHelp } = parseArgs();

  if (showHelp) {
    showUsage();
    process.exit(0);
  }

  const logger = consoleLogger;
  const controller = new AbortController();
  const removeInterruptHandler = onInterrupt(() => controller.abort());

  const start = Date.now();
  let failed = false;

  try {
    await fs.mkdir(CACHE_DIR, { recursive: true });

    logger.info(`Fetching manual index page: ${DEFAULT_SITE.indexUrl}`);
    const indexHtml = await fetchPage(DEFAULT_SITE.indexUrl, { signal: controller.signal });
    const chapters = discoverChapters(indexHtml, DEFAULT_SITE, CACHE_DIR);
    logger.info(`Found ${chapters.length} chapters.`);

    let markdown = await buildManual(chapters, {
      site: DEFAULT_SITE,
      force,
      logger,
      signal: controller.signal,
      onProgress: progressBar,
    });
    await fs.writeFile(MANUAL_FILE, markdown, "utf-8");
    logger.info(`Markdown manual saved to ${MANUAL_FILE}`);

    if (pdf) {
      await fs.mkdir(IMAGES_DIR, { recursive: true });
      const images = await rewriteImages(markdown, {
        imagesDir: IMAGES_DIR,
        force,
        logger,
        signal: controller.signal,
      });
      if (images.stats.converted + images.stats.reused > 0) {
        markdown = images.markdown;
        await fs.writeFile(MANUAL_FILE, markdown, "utf-8");
      }
      logger.info(
        `Images: ${images.stats.converted} converted, ${images.stats.reused} reused, ${images.stats.failed} failed`,
      );

      const result = await exportPdf(MANUAL_FILE, PDF_FILE, { logger });
      failed = result.status === "failed";
    }

    if (!failed) {
      logger.info(`\nCompleted in ${formatDuration(Date.now() - start)}`);
    }
  } catch (error) {
    logger.error(errorMessage(error));
    failed = true;
  } finally {
    removeInterruptHandler();
  }

  if (failed) {
    process.exit(1);
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Only run main when executed directly (not when imported for testing)
if (isMainModule()) {
  setupSignalHandlers("Manual build");
  main().catch((error) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
