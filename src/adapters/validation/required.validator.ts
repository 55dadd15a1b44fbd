// =============================================================================
// RequiredValidator: Applicable fields must be present and non-blank
// =============================================================================

import type { ValidationInput, ValidatorPort } from "../../ports/validator.port.js";
import type { ValidatorDefinition } from "../../domain/catalog.schema.js";
import type { ValidationResult } from "../../domain/job.schema.js";
import { failResult, fieldValue, isBlank, passResult } from "./result.js";

export class RequiredValidator implements ValidatorPort {
  readonly validatorType = "required" as const;

  async validate(definition: ValidatorDefinition, input: ValidationInput): Promise<ValidationResult> {
    const missing = definition.applicableFields.filter((code) => isBlank(fieldValue(input.fields, code)));
    const fieldName = definition.applicableFields.length === 1 ? definition.applicableFields[0] : undefined;

    if (missing.length === 0) return passResult(definition, "", { fieldName });
    return failResult(definition, `Missing required fields: ${missing.join(", ")}`, {
      fieldName,
      details: { missing },
    });
  }
}
