// =============================================================================
// Validator helpers: Result builders and config parsing
// =============================================================================

import type { z } from "zod";
import type { ValidatorDefinition } from "../../domain/catalog.schema.js";
import type { ValidationResult } from "../../domain/job.schema.js";

type ResultExtras = Partial<
  Pick<ValidationResult, "fieldName" | "expectedValue" | "actualValue" | "details">
>;

export function passResult(
  definition: ValidatorDefinition,
  message = "",
  extras: ResultExtras = {},
): ValidationResult {
  return buildResult(definition, true, message, extras);
}

export function failResult(
  definition: ValidatorDefinition,
  message: string,
  extras: ResultExtras = {},
): ValidationResult {
  return buildResult(definition, false, message, extras);
}

function buildResult(
  definition: ValidatorDefinition,
  passed: boolean,
  message: string,
  extras: ResultExtras,
): ValidationResult {
  return {
    validatorId: definition.id,
    validatorCode: definition.code,
    validatorName: definition.name,
    passed,
    severity: definition.severity,
    message,
    fieldName: extras.fieldName,
    expectedValue: extras.expectedValue,
    actualValue: extras.actualValue,
    details: extras.details ?? {},
  };
}

export type ConfigParse<T> = { ok: true; config: T } | { ok: false; result: ValidationResult };

/** Parses `definition.config`; a bad config becomes a failing result. */
export function parseConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  definition: ValidatorDefinition,
): ConfigParse<T> {
  const parsed = schema.safeParse(definition.config);
  if (parsed.success) return { ok: true, config: parsed.data };
  const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`);
  return {
    ok: false,
    result: failResult(definition, `Invalid ${definition.validatorType} config: ${issues.join("; ")}`),
  };
}

/** The data's own value for `code`; inherited members read as absent. */
export function fieldValue(data: Record<string, unknown>, code: string): unknown {
  return Object.hasOwn(data, code) ? data[code] : undefined;
}

/** Strings as-is, everything else as JSON. */
export function displayValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "";
  return JSON.stringify(value);
}

export function isBlank(value: unknown): boolean {
  return value === null || value === undefined || displayValue(value).trim() === "";
}

/** First applicable field, which single-field validators check. */
export function targetField(definition: ValidatorDefinition): string | undefined {
  return definition.applicableFields[0];
}

/** Numbers as-is; numeric strings parsed, allowing thousands separators and a leading currency sign. */
export function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const cleaned = value.trim().replace(/^[$€£¥]/, "").replace(/[\s,]/g, "");
  if (cleaned === "") return null;
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : null;
}
