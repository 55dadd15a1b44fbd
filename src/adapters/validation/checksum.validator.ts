// =============================================================================
// ChecksumValidator: Luhn and ISO 7064 MOD-97 check digits
// =============================================================================

import { z } from "zod";
import type { ValidationInput, ValidatorPort } from "../../ports/validator.port.js";
import type { ValidatorDefinition } from "../../domain/catalog.schema.js";
import type { ValidationResult } from "../../domain/job.schema.js";
import { displayValue, failResult, fieldValue, parseConfig, passResult, targetField } from "./result.js";

const ChecksumConfigSchema = z.object({
  algorithm: z.enum(["luhn", "mod97"]),
});

export function luhnValid(input: string): boolean {
  const digits = input.replace(/[\s-]/g, "");
  if (!/^\d{2,}$/.test(digits)) return false;
  let sum = 0;
  for (let i = 0; i < digits.length; i++) {
    let digit = Number(digits[digits.length - 1 - i]);
    if (i % 2 === 1) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
  }
  return sum % 10 === 0;
}

/** IBAN-style check: first four characters moved to the end, letters as 10..35. */
export function mod97Valid(input: string): boolean {
  const cleaned = input.replace(/\s/g, "").toUpperCase();
  if (!/^[A-Z0-9]{5,}$/.test(cleaned)) return false;
  const rearranged = cleaned.slice(4) + cleaned.slice(0, 4);
  let remainder = 0;
  for (const ch of rearranged) {
    const code = /\d/.test(ch) ? ch : String(ch.charCodeAt(0) - 55);
    for (const digit of code) {
      remainder = (remainder * 10 + Number(digit)) % 97;
    }
  }
  return remainder === 1;
}

export class ChecksumValidator implements ValidatorPort {
  readonly validatorType = "checksum" as const;

  async validate(definition: ValidatorDefinition, input: ValidationInput): Promise<ValidationResult> {
    const fieldName = targetField(definition);
    if (!fieldName) return passResult(definition, "No field configured");

    const value = fieldValue(input.fields, fieldName);
    if (value === null || value === undefined) {
      return passResult(definition, "Field not present, skipping checksum", { fieldName });
    }

    const parsed = parseConfig(ChecksumConfigSchema, definition);
    if (!parsed.ok) return parsed.result;

    const text = displayValue(value);
    const valid = parsed.config.algorithm === "luhn" ? luhnValid(text) : mod97Valid(text);
    if (valid) return passResult(definition, "", { fieldName });
    return failResult(definition, `${parsed.config.algorithm} checksum failed: ${text}`, {
      fieldName,
      actualValue: text,
    });
  }
}
