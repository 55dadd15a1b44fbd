// =============================================================================
// PageBasedSplitter: Every page is its own document
// =============================================================================

import type { DocumentSplitterPort } from "../../ports/splitter.port.js";
import type { PageImage } from "../../domain/common.schema.js";
import type { SplittingResult } from "../../domain/pipeline.schema.js";

export class PageBasedSplitter implements DocumentSplitterPort {
  readonly strategyName = "page_based";

  async detectBoundaries(pages: PageImage[]): Promise<SplittingResult> {
    return {
      boundaries: pages.map((page) => ({
        startPage: page.pageNumber,
        endPage: page.pageNumber,
        confidence: 1,
        reasoning: "Single page per document (page-based strategy)",
        detectedTypeHint: "",
      })),
      strategy: this.strategyName,
      confidence: 1,
    };
  }
}
