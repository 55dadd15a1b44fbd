// =============================================================================
// CrossFieldValidator: Consistency between several extracted fields
// =============================================================================

import { z } from "zod";
import type { ValidationInput, ValidatorPort } from "../../ports/validator.port.js";
import type { ValidatorDefinition } from "../../domain/catalog.schema.js";
import type { ValidationResult } from "../../domain/job.schema.js";
import { displayValue, failResult, fieldValue, parseConfig, passResult, toNumber } from "./result.js";

const CrossFieldConfigSchema = z.object({
  rule: z.string().default(""),
  fields: z.array(z.string()).default([]),
  totalField: z.string().default(""),
  tolerance: z.number().min(0).default(0.01),
});
type CrossFieldConfig = z.infer<typeof CrossFieldConfigSchema>;

export class CrossFieldValidator implements ValidatorPort {
  readonly validatorType = "cross_field" as const;

  async validate(definition: ValidatorDefinition, input: ValidationInput): Promise<ValidationResult> {
    const parsed = parseConfig(CrossFieldConfigSchema, definition);
    if (!parsed.ok) return parsed.result;
    const config = parsed.config;

    switch (config.rule) {
      case "match":
        return this.checkMatch(definition, input.fields, config.fields);
      case "sum":
        return this.checkSum(definition, input.fields, config);
      case "date_order":
        return this.checkDateOrder(definition, input.fields, config.fields);
      default:
        return passResult(definition, `Unknown cross-field rule: ${config.rule}`);
    }
  }

  private checkMatch(
    definition: ValidatorDefinition,
    data: Record<string, unknown>,
    fields: string[],
  ): ValidationResult {
    if (fields.length < 2) return passResult(definition, "Match requires at least 2 fields");

    const present = fields
      .map((code) => fieldValue(data, code))
      .filter((v) => v !== null && v !== undefined)
      .map(displayValue);
    if (present.length < 2) return passResult(definition, "Not enough fields present to compare");

    if (new Set(present).size === 1) {
      return passResult(definition, `Fields ${fields.join(", ")} match`);
    }
    return failResult(definition, `Fields ${fields.join(", ")} do not match`, {
      details: Object.fromEntries(fields.map((code) => [code, fieldValue(data, code) ?? null])),
    });
  }

  private checkSum(
    definition: ValidatorDefinition,
    data: Record<string, unknown>,
    config: CrossFieldConfig,
  ): ValidationResult {
    const amount = (code: string): number | null => {
      const value = fieldValue(data, code);
      return value === null || value === undefined ? 0 : toNumber(value);
    };

    const total = amount(config.totalField);
    const parts = config.fields.map(amount);
    if (total === null || parts.some((p) => p === null)) {
      return failResult(definition, `Cannot compute sum of ${config.fields.join(", ")}: non-numeric value`);
    }

    const sum = parts.reduce<number>((acc, p) => acc + (p ?? 0), 0);
    if (Math.abs(sum - total) <= config.tolerance + Number.EPSILON) {
      return passResult(
        definition,
        `Sum of ${config.fields.join(", ")} (${sum}) matches ${config.totalField} (${total})`,
      );
    }
    return failResult(
      definition,
      `Sum of ${config.fields.join(", ")} (${sum}) does not match ${config.totalField} (${total})`,
      { expectedValue: String(total), actualValue: String(sum) },
    );
  }

  private checkDateOrder(
    definition: ValidatorDefinition,
    data: Record<string, unknown>,
    fields: string[],
  ): ValidationResult {
    if (fields.length < 2) return passResult(definition, "Date order requires at least 2 fields");

    const dates: Array<{ code: string; text: string; time: number }> = [];
    for (const code of fields) {
      const value = fieldValue(data, code);
      if (value === null || value === undefined) continue;
      const text = displayValue(value);
      const time = Date.parse(text);
      if (Number.isNaN(time)) {
        return failResult(definition, `Cannot parse date for field '${code}': ${text}`, { fieldName: code });
      }
      dates.push({ code, text, time });
    }
    if (dates.length < 2) return passResult(definition, "Not enough dates to compare");

    for (let i = 0; i < dates.length - 1; i++) {
      const a = dates[i];
      const b = dates[i + 1];
      if (a && b && a.time > b.time) {
        return failResult(
          definition,
          `Date order violation: ${a.code} (${a.text}) is after ${b.code} (${b.text})`,
        );
      }
    }
    return passResult(definition, `Dates in correct order: ${fields.join(", ")}`);
  }
}
