// =============================================================================
// SplittingStep: Writes ctx.splittingResult
// =============================================================================

import type { PipelineContext } from "../context.js";
import type { SplittingService } from "../../services/splitting.service.js";
import type { CostEstimatorPort } from "../../ports/cost-estimator.port.js";
import { totalTokens } from "../../domain/common.schema.js";
import { PipelineError } from "../../errors.js";
import type { PipelineStep } from "./step.js";

export class SplittingStep implements PipelineStep {
  readonly name = "split";

  constructor(
    private readonly splitting: SplittingService,
    private readonly costs: CostEstimatorPort,
  ) {}

  async execute(ctx: PipelineContext): Promise<void> {
    if (!ctx.preprocessingResult) {
      throw new PipelineError("Splitting requires pre-processed pages");
    }
    const result = await this.splitting.split(ctx.preprocessingResult.pages, ctx.splittingStrategy);
    ctx.splittingResult = result;

    // Visual splitting spends tokens before any document exists
    if (result.usage) {
      ctx.totalTokensUsed += totalTokens(result.usage);
      if (result.model) ctx.totalCostUsd += this.costs.estimate(result.model, result.usage);
    }
  }
}
