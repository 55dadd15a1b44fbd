// =============================================================================
// PersistenceStep: Stores one DocumentResult per processed document
// =============================================================================

import { randomUUID } from "node:crypto";
import type { PipelineContext } from "../context.js";
import type { CostEstimatorPort } from "../../ports/cost-estimator.port.js";
import { confidenceFromScore, totalTokens, type TokenUsage } from "../../domain/common.schema.js";
import type { DocumentResult } from "../../domain/job.schema.js";
import type { ClassificationResult } from "../../domain/pipeline.schema.js";
import type { ResultService } from "../../services/result.service.js";
import { computeValidationScore, isValid } from "../../services/validation.service.js";
import type { PipelineStep } from "./step.js";

/**
 * Mean of the classification confidence (when there is a match) and the
 * validation score (when below 1). With neither the score is 1.
 */
export function overallConfidenceScore(
  classification: ClassificationResult | undefined,
  validationScore: number,
): number {
  const scores: number[] = [];
  if (classification?.bestMatch) scores.push(classification.bestMatch.confidence);
  if (validationScore < 1) scores.push(validationScore);
  if (scores.length === 0) return 1;
  return scores.reduce((sum, s) => sum + s, 0) / scores.length;
}

export class PersistenceStep implements PipelineStep {
  readonly name = "persist";

  constructor(
    private readonly results: ResultService,
    private readonly costs: CostEstimatorPort,
  ) {}

  async execute(ctx: PipelineContext): Promise<void> {
    const doc = ctx.document;
    const { classification, extraction, validationResults } = doc;
    const first = doc.pages[0];
    const last = doc.pages[doc.pages.length - 1];
    const match = classification?.bestMatch ?? undefined;

    let tokensUsed = 0;
    let costUsd = 0;
    const charge = (model: string | undefined, usage: TokenUsage | undefined): void => {
      if (!usage) return;
      tokensUsed += totalTokens(usage);
      if (model) costUsd += this.costs.estimate(model, usage);
    };
    charge(classification?.model, classification?.usage);
    charge(extraction?.model, extraction?.usage);

    const validationScore = computeValidationScore(validationResults);
    const result: DocumentResult = {
      id: randomUUID(),
      jobId: ctx.jobId,
      documentIndex: doc.index,
      documentTypeId: match?.documentTypeId,
      documentTypeCode: match?.documentTypeCode,
      classificationConfidence: match?.confidence ?? 0,
      classificationReasoning: match?.reasoning ?? classification?.reasoning ?? "",
      alternativeClassifications: (match ? classification?.candidates.slice(1) ?? [] : []).map((c) => ({
        code: c.documentTypeCode,
        confidence: c.confidence,
        reasoning: c.reasoning,
      })),
      pageRangeStart: first?.pageNumber ?? doc.boundary.startPage,
      pageRangeEnd: last?.pageNumber ?? doc.boundary.endPage,
      pageCount: doc.pages.length,
      extractedFields: extraction?.fields ?? {},
      extractionConfidence: extraction?.confidence ?? {},
      extractionMetadata: extraction?.metadata ?? {},
      validationResults,
      isValid: isValid(validationResults),
      validationScore,
      overallConfidence: confidenceFromScore(overallConfidenceScore(classification, validationScore)),
      processingDurationMs: Date.now() - doc.startedAt,
      tokensUsed,
      costUsd,
      createdAt: Date.now(),
    };

    const stored = await this.results.saveDocumentResult(result);
    ctx.documentResults.push(stored);
    ctx.totalTokensUsed += tokensUsed;
    ctx.totalCostUsd += costUsd;
  }
}
