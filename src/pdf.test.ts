import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Logger } from "./logger.js";
import { type CommandRunner, exportPdf, pandocArgs, qpdfArgs } from "./pdf.js";

let outputDir: string;
let markdownPath: string;
let pdfPath: string;

beforeEach(async () => {
  outputDir = await fs.mkdtemp(path.join(os.tmpdir(), "manual-pdf-"));
  markdownPath = path.join(outputDir, "manual.md");
  pdfPath = path.join(outputDir, "manual.pdf");
  await fs.writeFile(markdownPath, "# Manual");
});

afterEach(async () => {
  await fs.rm(outputDir, { recursive: true, force: true });
});

function missing(command: string): Error {
  return Object.assign(new Error(`spawn ${command} ENOENT`), { code: "ENOENT" });
}

function recordingLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

/** Pandoc writes a PDF of the given size; qpdf behaves as `qpdf` says */
function fakeRunner(options: { pandoc?: Error; qpdf?: Error; pdfBytes?: number } = {}) {
  return vi.fn<CommandRunner>(async (command) => {
    if (command === "pandoc") {
      if (options.pandoc) throw options.pandoc;
      await fs.writeFile(pdfPath, Buffer.alloc(options.pdfBytes ?? 1024));
      return;
    }
    if (options.qpdf) throw options.qpdf;
  });
}

describe("pandocArgs", () => {
  it("requests a table of contents, xelatex and one-inch margins", () => {
    expect(pandocArgs("output/manual.md", "output/manual.pdf")).toEqual([
      "output/manual.md",
      "-o",
      "output/manual.pdf",
      "--toc",
      "--standalone",
      "--pdf-engine=xelatex",
      "-V",
      "geometry:margin=1in",
      "--resource-path=output",
    ]);
  });
});

describe("qpdfArgs", () => {
  it("recompresses in place", () => {
    expect(qpdfArgs("output/manual.pdf")).toEqual([
      "--recompress-flate",
      "--compression-level=9",
      "--object-streams=generate",
      "--replace-input",
      "output/manual.pdf",
    ]);
  });
});

describe("exportPdf", () => {
  it("renders with pandoc, compresses with qpdf and reports the size", async () => {
    const runner = fakeRunner({ pdfBytes: 512 * 1024 });
    const logger = recordingLogger();

    const result = await exportPdf(markdownPath, pdfPath, { runner, logger });

    expect(result).toEqual({ status: "exported", path: pdfPath, sizeBytes: 512 * 1024, compressed: true });
    expect(runner.mock.calls).toEqual([
      ["pandoc", pandocArgs(markdownPath, pdfPath)],
      ["qpdf", qpdfArgs(pdfPath)],
    ]);
    expect(logger.info).toHaveBeenCalledWith(`Converting ${markdownPath} to PDF using pandoc...`);
    expect(logger.info).toHaveBeenCalledWith(`PDF saved to: ${pdfPath} (0.50 MB)`);
  });

  it("skips the export when pandoc is not installed", async () => {
    const runner = fakeRunner({ pandoc: missing("pandoc") });
    const logger = recordingLogger();

    const result = await exportPdf(markdownPath, pdfPath, { runner, logger });

    expect(result).toEqual({ status: "skipped", reason: "pandoc not found" });
    expect(runner).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      "Pandoc not found. Skipping PDF generation. Install pandoc to create the PDF.",
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("reports a failing pandoc run", async () => {
    const runner = fakeRunner({ pandoc: new Error("xelatex not found") });
    const logger = recordingLogger();

    const result = await exportPdf(markdownPath, pdfPath, { runner, logger });

    expect(result).toEqual({ status: "failed", message: "xelatex not found" });
    expect(runner).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith("PDF generation failed - xelatex not found");
  });

  it("keeps the uncompressed PDF when qpdf is not installed", async () => {
    const runner = fakeRunner({ qpdf: missing("qpdf") });
    const logger = recordingLogger();

    const result = await exportPdf(markdownPath, pdfPath, { runner, logger });

    expect(result).toEqual({ status: "exported", path: pdfPath, sizeBytes: 1024, compressed: false });
    expect(logger.warn).toHaveBeenCalledWith("qpdf not found. Skipping PDF compression.");
  });

  it("keeps the uncompressed PDF when qpdf fails", async () => {
    const runner = fakeRunner({ qpdf: new Error("damaged file") });
    const logger = recordingLogger();

    const result = await exportPdf(markdownPath, pdfPath, { runner, logger });

    expect(result).toMatchObject({ status: "exported", compressed: false });
    expect(logger.warn).toHaveBeenCalledWith("PDF compression failed - damaged file");
  });
});
