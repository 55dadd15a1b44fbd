// =============================================================================
// PassthroughPageProcessor: Single-image files as one page, no image work
// =============================================================================

import type { PageConversionOptions, PreProcessorPort } from "../../ports/page-processor.port.js";
import type { FileReference, PageImage } from "../../domain/common.schema.js";
import { PageExtractionError } from "../../errors.js";

/**
 * Accepts image files and returns them unchanged as a single page. PDFs go
 * through {@link PdfPageProcessor}, which falls back to this one.
 */
export class PassthroughPageProcessor implements PreProcessorPort {
  async convertToImages(file: FileReference, options: PageConversionOptions): Promise<PageImage[]> {
    if (!file.mimeType.startsWith("image/")) {
      throw new PageExtractionError(`no page converter for ${file.mimeType}`, {
        filename: file.filename,
        mimeType: file.mimeType,
      });
    }
    if (!file.contentPath) {
      throw new PageExtractionError("file has no local content", { filename: file.filename });
    }

    return [
      {
        pageNumber: 1,
        imagePath: file.contentPath,
        width: 0,
        height: 0,
        dpi: options.dpi,
        rotationApplied: 0,
        enhancementsApplied: [],
        qualityScore: 1,
      },
    ];
  }

  async detectRotation(): Promise<number> {
    return 0;
  }

  async correctRotation(page: PageImage, angle: number): Promise<PageImage> {
    return { ...page, rotationApplied: angle };
  }

  async enhance(page: PageImage): Promise<PageImage> {
    return page;
  }

  async assessQuality(page: PageImage): Promise<number> {
    return page.qualityScore;
  }
}
