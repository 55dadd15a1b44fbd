// =============================================================================
// ValidationStep: Writes the current document's validation results
// =============================================================================

import type { PipelineContext } from "../context.js";
import type { ValidationService } from "../../services/validation.service.js";
import type { PipelineStep } from "./step.js";

export class ValidationStep implements PipelineStep {
  readonly name = "validate";

  constructor(private readonly validation: ValidationService) {}

  /** Runs even without an extraction, giving an empty and valid result. */
  async execute(ctx: PipelineContext): Promise<void> {
    const doc = ctx.document;
    const match = doc.classification?.bestMatch ?? undefined;
    doc.validationResults = await this.validation.validate({
      pages: doc.pages,
      fields: doc.extraction?.fields ?? {},
      documentTypeId: match?.documentTypeId,
      documentTypeCode: match?.documentTypeCode,
      resolvedFields: doc.resolvedFields,
    });
  }
}
