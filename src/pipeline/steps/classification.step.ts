// =============================================================================
// ClassificationStep: Writes the current document's classification
// =============================================================================

import type { PipelineContext } from "../context.js";
import type { ClassificationService } from "../../services/classification.service.js";
import type { PipelineStep } from "./step.js";

export class ClassificationStep implements PipelineStep {
  readonly name = "classify";

  constructor(private readonly classification: ClassificationService) {}

  async execute(ctx: PipelineContext): Promise<void> {
    const doc = ctx.document;
    doc.classification = await this.classification.classify(doc.pages, {
      expectedType: ctx.expectedType,
      expectedNature: ctx.expectedNature,
      adHocTypes: ctx.adHocDocumentTypes,
    });
  }
}
