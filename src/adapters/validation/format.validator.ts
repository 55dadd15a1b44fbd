// =============================================================================
// FormatValidator: Email, phone, IBAN, ISO date and regex checks
// =============================================================================

import { z } from "zod";
import type { ValidationInput, ValidatorPort } from "../../ports/validator.port.js";
import type { ValidatorDefinition } from "../../domain/catalog.schema.js";
import type { ValidationResult } from "../../domain/job.schema.js";
import { mod97Valid } from "./checksum.validator.js";
import { displayValue, failResult, fieldValue, parseConfig, passResult, targetField } from "./result.js";

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
export const PHONE_PATTERN = /^\+?[\d\s\-().]{7,20}$/;
export const IBAN_PATTERN = /^[A-Z]{2}\d{2}[A-Z0-9]{4,30}$/;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;

const FormatConfigSchema = z.object({
  format: z.enum(["email", "phone", "iban", "date"]).optional(),
  pattern: z.string().optional(),
});

export class FormatValidator implements ValidatorPort {
  readonly validatorType = "format" as const;

  async validate(definition: ValidatorDefinition, input: ValidationInput): Promise<ValidationResult> {
    const fieldName = targetField(definition);
    if (!fieldName) return passResult(definition, "No field configured");

    const value = fieldValue(input.fields, fieldName);
    if (value === null || value === undefined) {
      return passResult(definition, "Field not present, skipping format check", { fieldName });
    }

    const parsed = parseConfig(FormatConfigSchema, definition);
    if (!parsed.ok) return parsed.result;
    const { format, pattern } = parsed.config;
    const text = displayValue(value);

    switch (format) {
      case "email":
        return this.checkPattern(definition, fieldName, text, EMAIL_PATTERN, "email");
      case "phone":
        return this.checkPattern(definition, fieldName, text, PHONE_PATTERN, "phone");
      case "iban":
        return this.checkIban(definition, fieldName, text);
      case "date":
        return this.checkDate(definition, fieldName, text);
      default:
        break;
    }

    if (pattern) {
      let compiled: RegExp;
      try {
        compiled = new RegExp(pattern);
      } catch {
        return failResult(definition, `Invalid regex pattern: ${pattern}`, { fieldName });
      }
      return this.checkPattern(definition, fieldName, text, compiled, "pattern");
    }

    return passResult(definition, "No format rule configured", { fieldName });
  }

  private checkPattern(
    definition: ValidatorDefinition,
    fieldName: string,
    value: string,
    pattern: RegExp,
    formatName: string,
  ): ValidationResult {
    if (pattern.test(value)) return passResult(definition, "", { fieldName });
    return failResult(definition, `Value '${value}' does not match ${formatName} format`, {
      fieldName,
      expectedValue: `Pattern: ${pattern.source}`,
      actualValue: value,
    });
  }

  private checkIban(definition: ValidatorDefinition, fieldName: string, value: string): ValidationResult {
    const cleaned = value.replace(/\s/g, "").toUpperCase();
    if (!IBAN_PATTERN.test(cleaned)) {
      return failResult(definition, `Invalid IBAN format: ${value}`, { fieldName, actualValue: value });
    }
    if (!mod97Valid(cleaned)) {
      return failResult(definition, `IBAN checksum failed: ${value}`, { fieldName, actualValue: value });
    }
    return passResult(definition, "", { fieldName });
  }

  private checkDate(definition: ValidatorDefinition, fieldName: string, value: string): ValidationResult {
    if (ISO_DATE_PATTERN.test(value.trim()) && !Number.isNaN(Date.parse(value.trim()))) {
      return passResult(definition, "", { fieldName });
    }
    return failResult(definition, `Value '${value}' is not an ISO date`, {
      fieldName,
      expectedValue: "YYYY-MM-DD",
      actualValue: value,
    });
  }
}
