// =============================================================================
// PdfPageProcessor: PDF pages rendered to PNG with pdf.js and a Skia canvas
// =============================================================================

import { mkdir, mkdtemp, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createCanvas } from "@napi-rs/canvas";
import { getDocument, type PDFPageProxy } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { PageConversionOptions, PreProcessorPort } from "../../ports/page-processor.port.js";
import type { FileReference, PageImage } from "../../domain/common.schema.js";
import { PageExtractionError, errorMessage } from "../../errors.js";
import { silentLogger, type Logger } from "../../logging.js";
import { PassthroughPageProcessor } from "./passthrough-page-processor.adapter.js";

/** pdf.js lays pages out in points. */
const PDF_POINTS_PER_INCH = 72;

export interface PdfPageProcessorOptions {
  /** Handles every non-PDF file and all per-page image work */
  fallback?: PreProcessorPort;
  logger?: Logger;
}

/**
 * Rasterizes each page of a PDF into `outputDir` at the requested DPI. Other
 * files, rotation, enhancement and quality scoring go to the fallback.
 */
export class PdfPageProcessor implements PreProcessorPort {
  private readonly fallback: PreProcessorPort;
  private readonly logger: Logger;

  constructor(options: PdfPageProcessorOptions = {}) {
    this.fallback = options.fallback ?? new PassthroughPageProcessor();
    this.logger = options.logger ?? silentLogger;
  }

  async convertToImages(file: FileReference, options: PageConversionOptions): Promise<PageImage[]> {
    if (file.mimeType !== "application/pdf") return this.fallback.convertToImages(file, options);
    if (!file.contentPath) {
      throw new PageExtractionError("file has no local content", { filename: file.filename });
    }

    const data = new Uint8Array(await readFile(file.contentPath));
    await mkdir(options.outputDir, { recursive: true });
    const dir = await mkdtemp(join(options.outputDir, "pdf-"));

    try {
      const pdf = await getDocument({ data, verbosity: 0 }).promise;
      const pages: PageImage[] = [];
      for (let n = 1; n <= pdf.numPages; n++) {
        pages.push(await this.renderPage(await pdf.getPage(n), n, dir, options.dpi));
      }
      await pdf.destroy();
      this.logger.debug("pdf.rasterized", { filename: file.filename, pages: pages.length, dpi: options.dpi });
      return pages;
    } catch (error) {
      throw new PageExtractionError(errorMessage(error), { filename: file.filename, mimeType: file.mimeType });
    }
  }

  detectRotation(page: PageImage): Promise<number> {
    return this.fallback.detectRotation(page);
  }

  correctRotation(page: PageImage, angle: number): Promise<PageImage> {
    return this.fallback.correctRotation(page, angle);
  }

  enhance(page: PageImage, options: { denoise: boolean }): Promise<PageImage> {
    return this.fallback.enhance(page, options);
  }

  assessQuality(page: PageImage): Promise<number> {
    return this.fallback.assessQuality(page);
  }

  private async renderPage(page: PDFPageProxy, pageNumber: number, dir: string, dpi: number): Promise<PageImage> {
    const viewport = page.getViewport({ scale: dpi / PDF_POINTS_PER_INCH });
    const width = Math.floor(viewport.width);
    const height = Math.floor(viewport.height);
    const canvas = createCanvas(width, height);
    const canvasContext = canvas.getContext("2d");

    const renderParameters = { canvas, canvasContext, viewport };
    await page.render(renderParameters).promise;

    const imagePath = join(dir, `page-${pageNumber}.png`);
    await writeFile(imagePath, await canvas.encode("png"));
    page.cleanup();

    return {
      pageNumber,
      imagePath,
      width,
      height,
      dpi,
      rotationApplied: 0,
      enhancementsApplied: [],
      qualityScore: 1,
    };
  }
}
