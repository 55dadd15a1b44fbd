// =============================================================================
// ValidatorPort: One handler per validator type
// =============================================================================

import type { PageImage, ValidatorType } from "../domain/common.schema.js";
import type { ValidatorDefinition } from "../domain/catalog.schema.js";
import type { ValidationResult } from "../domain/job.schema.js";

export interface ValidationInput {
  fields: Record<string, unknown>;
  pages: PageImage[];
  documentTypeCode?: string;
}

export interface ValidatorPort {
  readonly validatorType: ValidatorType;

  validate(definition: ValidatorDefinition, input: ValidationInput): Promise<ValidationResult>;
}
