// =============================================================================
// WholeDocumentSplitter: The whole file is one document
// =============================================================================

import type { DocumentSplitterPort } from "../../ports/splitter.port.js";
import type { PageImage } from "../../domain/common.schema.js";
import type { SplittingResult } from "../../domain/pipeline.schema.js";

export class WholeDocumentSplitter implements DocumentSplitterPort {
  readonly strategyName = "whole_document";

  async detectBoundaries(pages: PageImage[]): Promise<SplittingResult> {
    const first = pages[0];
    const last = pages[pages.length - 1];
    if (!first || !last) {
      return { boundaries: [], strategy: this.strategyName, confidence: 1 };
    }
    return {
      boundaries: [
        {
          startPage: first.pageNumber,
          endPage: last.pageNumber,
          confidence: 1,
          reasoning: "Entire file treated as a single document",
          detectedTypeHint: "",
        },
      ],
      strategy: this.strategyName,
      confidence: 1,
    };
  }
}
