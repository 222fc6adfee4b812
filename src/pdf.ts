/**
 * Convert the Markdown manual to PDF with pandoc, then shrink it with qpdf.
 *
 * Missing tools are not an error: the export is skipped with a warning.
 */

import { execFile } from "node:child_process";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { promisify } from "node:util";
import { errorMessage } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";

const execFileAsync = promisify(execFile);

const PANDOC = "pandoc";
const QPDF = "qpdf";
const PDF_ENGINE = "xelatex";
const PAGE_MARGIN = "1in";

/** Runs an external program and resolves when it exits successfully */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<void>;

export const execFileRunner: CommandRunner = async (command, args) => {
  await execFileAsync(command, [...args], { maxBuffer: 64 * 1024 * 1024 });
};

export type ExportResult =
  | { status: "exported"; path: string; sizeBytes: number; compressed: boolean }
  | { status: "skipped"; reason: string }
  | { status: "failed"; message: string };

export interface ExportPdfOptions {
  runner?: CommandRunner;
  logger?: Logger;
}

/** Spawn failed because the program is not installed */
function isMissingTool(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Arguments for pandoc: table of contents, fixed margin, xelatex, standalone.
 * Images resolve relative to the Markdown file's directory.
 */
export function pandocArgs(markdownPath: string, pdfPath: string): string[] {
  return [
    markdownPath,
    "-o",
    pdfPath,
    "--toc",
    "--standalone",
    `--pdf-engine=${PDF_ENGINE}`,
    "-V",
    `geometry:margin=${PAGE_MARGIN}`,
    `--resource-path=${path.dirname(markdownPath)}`,
  ];
}

/** Arguments for a lossless in-place recompression with qpdf */
export function qpdfArgs(pdfPath: string): string[] {
  return ["--recompress-flate", "--compression-level=9", "--object-streams=generate", "--replace-input", pdfPath];
}

async function compressPdf(pdfPath: string, runner: CommandRunner, logger: Logger): Promise<boolean> {
  try {
    await runner(QPDF, qpdfArgs(pdfPath));
    return true;
  } catch (error) {
    if (isMissingTool(error)) {
      logger.warn("qpdf not found. Skipping PDF compression.");
    } else {
      logger.warn(`PDF compression failed - ${errorMessage(error)}`);
    }
    return false;
  }
}

/**
 * Render a Markdown file to PDF and compress the result.
 */
export async function exportPdf(
  markdownPath: string,
  pdfPath: string,
  options: ExportPdfOptions = {},
): Promise<ExportResult> {
  const runner = options.runner ?? execFileRunner;
  const logger = options.logger ?? silentLogger;

  logger.info(`Converting ${markdownPath} to PDF using pandoc...`);
  try {
    await runner(PANDOC, pandocArgs(markdownPath, pdfPath));
  } catch (error) {
    if (isMissingTool(error)) {
      logger.warn("Pandoc not found. Skipping PDF generation. Install pandoc to create the PDF.");
      return { status: "skipped", reason: "pandoc not found" };
    }
    const message = errorMessage(error);
    logger.error(`PDF generation failed - ${message}`);
    return { status: "failed", message };
  }

  const compressed = await compressPdf(pdfPath, runner, logger);

  const stats = await fs.stat(pdfPath);
  const sizeMb = (stats.size / 1024 / 1024).toFixed(2);
  logger.info(`PDF saved to: ${pdfPath} (${sizeMb} MB)`);

  return { status: "exported", path: pdfPath, sizeBytes: stats.size, compressed };
}
