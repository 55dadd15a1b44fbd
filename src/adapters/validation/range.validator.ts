// =============================================================================
// RangeValidator: Numeric bounds and date windows
// =============================================================================

import { z } from "zod";
import type { ValidationInput, ValidatorPort } from "../../ports/validator.port.js";
import type { ValidatorDefinition } from "../../domain/catalog.schema.js";
import type { ValidationResult } from "../../domain/job.schema.js";
import {
  displayValue,
  failResult,
  fieldValue,
  parseConfig,
  passResult,
  targetField,
  toNumber,
} from "./result.js";

const DateBoundSchema = z.string().refine((value) => !Number.isNaN(Date.parse(value)), "Invalid date");

const RangeConfigSchema = z.object({
  min: z.number().optional(),
  max: z.number().optional(),
  /** Inclusive lower date bound (ISO) */
  after: DateBoundSchema.optional(),
  /** Inclusive upper date bound (ISO) */
  before: DateBoundSchema.optional(),
});

export class RangeValidator implements ValidatorPort {
  readonly validatorType = "range" as const;

  async validate(definition: ValidatorDefinition, input: ValidationInput): Promise<ValidationResult> {
    const fieldName = targetField(definition);
    if (!fieldName) return passResult(definition, "No field configured");

    const value = fieldValue(input.fields, fieldName);
    if (value === null || value === undefined) {
      return passResult(definition, "Field not present, skipping range check", { fieldName });
    }

    const parsed = parseConfig(RangeConfigSchema, definition);
    if (!parsed.ok) return parsed.result;
    const { min, max, after, before } = parsed.config;
    const text = displayValue(value);

    if (min !== undefined || max !== undefined) {
      const numeric = toNumber(value);
      if (numeric === null) {
        return failResult(definition, `Value '${text}' is not a number`, { fieldName, actualValue: text });
      }
      if ((min !== undefined && numeric < min) || (max !== undefined && numeric > max)) {
        return failResult(definition, `Value ${numeric} is outside ${min ?? "-∞"}..${max ?? "∞"}`, {
          fieldName,
          expectedValue: `${min ?? "-∞"}..${max ?? "∞"}`,
          actualValue: String(numeric),
        });
      }
    }

    if (after !== undefined || before !== undefined) {
      const time = Date.parse(text);
      if (Number.isNaN(time)) {
        return failResult(definition, `Value '${text}' is not a date`, { fieldName, actualValue: text });
      }
      if ((after !== undefined && time < Date.parse(after)) || (before !== undefined && time > Date.parse(before))) {
        return failResult(definition, `Date ${text} is outside ${after ?? "..."} to ${before ?? "..."}`, {
          fieldName,
          expectedValue: `${after ?? "..."} to ${before ?? "..."}`,
          actualValue: text,
        });
      }
    }

    return passResult(definition, "", { fieldName });
  }
}
