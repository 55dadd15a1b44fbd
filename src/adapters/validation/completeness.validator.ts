// =============================================================================
// CompletenessValidator: Page count and field coverage
// =============================================================================

import { z } from "zod";
import type { ValidationInput, ValidatorPort } from "../../ports/validator.port.js";
import type { ValidatorDefinition } from "../../domain/catalog.schema.js";
import type { ValidationResult } from "../../domain/job.schema.js";
import { failResult, fieldValue, isBlank, parseConfig, passResult } from "./result.js";

const CompletenessConfigSchema = z.object({
  minPages: z.number().int().min(0).optional(),
  minFieldsPercent: z.number().min(0).max(100).optional(),
  requiredFields: z.array(z.string()).default([]),
});

export class CompletenessValidator implements ValidatorPort {
  readonly validatorType = "completeness" as const;

  async validate(definition: ValidatorDefinition, input: ValidationInput): Promise<ValidationResult> {
    const parsed = parseConfig(CompletenessConfigSchema, definition);
    if (!parsed.ok) return parsed.result;
    const { minPages, minFieldsPercent, requiredFields } = parsed.config;

    if (minPages !== undefined && input.pages.length < minPages) {
      return failResult(
        definition,
        `Document has ${input.pages.length} pages, minimum required: ${minPages}`,
        { expectedValue: String(minPages), actualValue: String(input.pages.length) },
      );
    }

    if (minFieldsPercent !== undefined) {
      const considered =
        definition.applicableFields.length > 0 ? definition.applicableFields : Object.keys(input.fields);
      if (considered.length > 0) {
        const present = considered.filter((code) => !isBlank(fieldValue(input.fields, code))).length;
        const percent = (present / considered.length) * 100;
        if (percent < minFieldsPercent) {
          return failResult(
            definition,
            `Field completeness ${percent.toFixed(1)}% below minimum ${minFieldsPercent}%`,
            { expectedValue: `>= ${minFieldsPercent}%`, actualValue: `${percent.toFixed(1)}%` },
          );
        }
      }
    }

    const missing = requiredFields.filter((code) => isBlank(fieldValue(input.fields, code)));
    if (missing.length > 0) {
      return failResult(definition, `Missing required fields: ${missing.join(", ")}`, {
        details: { missing },
      });
    }

    return passResult(definition, "Document completeness check passed");
  }
}
