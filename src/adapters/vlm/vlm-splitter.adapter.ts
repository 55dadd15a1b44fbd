// =============================================================================
// VlmSplitterAdapter: Boundary detection over consecutive page pairs
// =============================================================================

import { generateObject } from "ai";
import { z } from "zod";
import type { DocumentSplitterPort } from "../../ports/splitter.port.js";
import type { DocumentBoundary, PageImage, TokenUsage } from "../../domain/common.schema.js";
import type { SplittingResult } from "../../domain/pipeline.schema.js";
import { errorMessage } from "../../errors.js";
import type { Logger } from "../../logging.js";
import { silentLogger } from "../../logging.js";
import { callSettings, type VlmAdapterOptions } from "./models.js";
import { addUsage, buildPageContent, toTokenUsage } from "./pages.js";

export const BoundaryAnalysisSchema = z.object({
  isBoundary: z.boolean().describe("True when the second page starts a new document"),
  confidence: z.number().min(0).max(1),
  reasoning: z.string(),
  detectedTypeHint: z.string().describe("Type of the new document, empty if unknown"),
});
export type BoundaryAnalysis = z.infer<typeof BoundaryAnalysisSchema>;

const SYSTEM_PROMPT =
  "You are a document boundary detection agent. Analyze consecutive page images " +
  "to determine where one document ends and another begins.";

function boundaryPrompt(current: PageImage, next: PageImage): string {
  return (
    "Analyze these two consecutive document pages. Determine if they belong to the same " +
    "document or if the second page starts a new, different document.\n\n" +
    "Look for:\n" +
    "- Different headers, footers or logos\n" +
    "- Change in document layout or style\n" +
    "- New document title or heading\n" +
    "- Separator pages (blank, barcode, cover)\n\n" +
    `Page ${current.pageNumber} → Page ${next.pageNumber}`
  );
}

export interface VlmSplitterOptions extends VlmAdapterOptions {
  logger?: Logger;
}

export class VlmSplitterAdapter implements DocumentSplitterPort {
  readonly strategyName = "visual";
  private readonly logger: Logger;

  constructor(private readonly options: VlmSplitterOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async detectBoundaries(pages: PageImage[]): Promise<SplittingResult> {
    const first = pages[0];
    const last = pages[pages.length - 1];
    if (!first || !last) {
      return { boundaries: [], strategy: this.strategyName, confidence: 1 };
    }

    const boundaries: DocumentBoundary[] = [];
    let usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
    let currentStart = first.pageNumber;

    for (let i = 0; i < pages.length - 1; i++) {
      const current = pages[i];
      const next = pages[i + 1];
      if (!current || !next) continue;

      const { analysis, usage: pairUsage } = await this.analyzePair(current, next);
      usage = addUsage(usage, pairUsage);

      if (analysis.isBoundary) {
        boundaries.push({
          startPage: currentStart,
          endPage: current.pageNumber,
          confidence: analysis.confidence,
          reasoning: analysis.reasoning,
          detectedTypeHint: analysis.detectedTypeHint,
        });
        currentStart = next.pageNumber;
      }
    }

    boundaries.push({
      startPage: currentStart,
      endPage: last.pageNumber,
      confidence: 1,
      reasoning: pages.length === 1 ? "Single page document" : "Final document segment",
      detectedTypeHint: "",
    });

    const confidence = boundaries.reduce((sum, b) => sum + b.confidence, 0) / boundaries.length;
    return {
      boundaries,
      strategy: this.strategyName,
      confidence,
      model: this.options.modelName,
      usage,
    };
  }

  /** A failed call counts as "same document" with confidence 0.5. */
  private async analyzePair(
    current: PageImage,
    next: PageImage,
  ): Promise<{ analysis: BoundaryAnalysis; usage: TokenUsage }> {
    try {
      const content = await buildPageContent(boundaryPrompt(current, next), [current, next]);
      const result = await generateObject({
        ...callSettings(this.options),
        schema: BoundaryAnalysisSchema,
        schemaName: "BoundaryAnalysis",
        system: SYSTEM_PROMPT,
        messages: [{ role: "user", content }],
      });
      return { analysis: result.object, usage: toTokenUsage(result.usage) };
    } catch (error) {
      this.logger.warn("splitting.visual.pair_failed", {
        pages: [current.pageNumber, next.pageNumber],
        error: errorMessage(error),
      });
      return {
        analysis: {
          isBoundary: false,
          confidence: 0.5,
          reasoning: `VLM analysis failed: ${errorMessage(error)}`,
          detectedTypeHint: "",
        },
        usage: { inputTokens: 0, outputTokens: 0 },
      };
    }
  }
}
