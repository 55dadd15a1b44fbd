// =============================================================================
// IngestionStep: Writes ctx.fileReference
// =============================================================================

import type { PipelineContext } from "../context.js";
import type { IngestionService } from "../../services/ingestion.service.js";
import type { PipelineStep } from "./step.js";

export class IngestionStep implements PipelineStep {
  readonly name = "ingest";

  constructor(private readonly ingestion: IngestionService) {}

  async execute(ctx: PipelineContext): Promise<void> {
    ctx.fileReference = await this.ingestion.ingest(
      ctx.sourceType,
      ctx.sourceReference,
      ctx.filename,
    );
  }
}
