// =============================================================================
// PreProcessingStep: Writes ctx.preprocessingResult
// =============================================================================

import type { PipelineContext } from "../context.js";
import type { PreProcessingService } from "../../services/preprocessing.service.js";
import { PipelineError } from "../../errors.js";
import type { PipelineStep } from "./step.js";

export class PreProcessingStep implements PipelineStep {
  readonly name = "preprocess";

  constructor(private readonly preprocessing: PreProcessingService) {}

  async execute(ctx: PipelineContext): Promise<void> {
    if (!ctx.fileReference) {
      throw new PipelineError("Pre-processing requires an ingested file");
    }
    ctx.preprocessingResult = await this.preprocessing.preprocess(ctx.fileReference);
  }
}
