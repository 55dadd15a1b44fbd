// =============================================================================
// BusinessRuleValidator: `left op right` comparisons over extracted data
// =============================================================================

import type { ValidationInput, ValidatorPort } from "../../ports/validator.port.js";
import type { ValidatorDefinition } from "../../domain/catalog.schema.js";
import type { ValidationResult } from "../../domain/job.schema.js";
import { errorMessage } from "../../errors.js";
import { failResult, passResult, toNumber } from "./result.js";

type Operator = "==" | "!=" | ">=" | "<=" | ">" | "<";

// Two-character operators first so ">=" is never read as ">"
const OPERATORS: readonly Operator[] = ["==", "!=", ">=", "<=", ">", "<"];

type Operand = string | number | boolean | null;

/** Field reference, number, boolean, quoted string, or bare word. */
export function resolveToken(token: string, data: Record<string, unknown>): Operand {
  if (Object.hasOwn(data, token)) return normalize(data[token]);
  if (token !== "" && Number.isFinite(Number(token))) return Number(token);
  const lower = token.toLowerCase();
  if (lower === "true" || lower === "false") return lower === "true";
  if (
    token.length >= 2 &&
    ((token.startsWith('"') && token.endsWith('"')) || (token.startsWith("'") && token.endsWith("'")))
  ) {
    return token.slice(1, -1);
  }
  return token;
}

function normalize(value: unknown): Operand {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || typeof value === "boolean") return value;
  if (typeof value === "string") return toNumber(value) ?? value;
  return JSON.stringify(value);
}

function order(left: Operand, right: Operand): number {
  if (typeof left === "number" && typeof right === "number") return left - right;
  if (typeof left === "string" && typeof right === "string") {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  throw new Error(`Cannot order ${JSON.stringify(left)} and ${JSON.stringify(right)}`);
}

function compare(op: Operator, left: Operand, right: Operand): boolean {
  switch (op) {
    case "==":
      return left === right;
    case "!=":
      return left !== right;
    case ">":
      return order(left, right) > 0;
    case ">=":
      return order(left, right) >= 0;
    case "<":
      return order(left, right) < 0;
    case "<=":
      return order(left, right) <= 0;
  }
}

export function evaluateExpression(expression: string, data: Record<string, unknown>): boolean {
  for (const op of OPERATORS) {
    const index = expression.indexOf(op);
    if (index === -1) continue;
    const left = resolveToken(expression.slice(0, index).trim(), data);
    const right = resolveToken(expression.slice(index + op.length).trim(), data);
    return compare(op, left, right);
  }
  throw new Error(`Unsupported expression format: ${expression}`);
}

export class BusinessRuleValidator implements ValidatorPort {
  readonly validatorType = "business_rule" as const;

  async validate(definition: ValidatorDefinition, input: ValidationInput): Promise<ValidationResult> {
    const configured = definition.config["expression"];
    const expression =
      definition.ruleExpression || (typeof configured === "string" ? configured : "");
    if (!expression) return passResult(definition, "No business rule expression configured");

    try {
      if (evaluateExpression(expression, input.fields)) {
        return passResult(definition, `Business rule passed: ${expression}`);
      }
      return failResult(definition, `Business rule failed: ${expression}`);
    } catch (error) {
      return failResult(definition, `Error evaluating rule '${expression}': ${errorMessage(error)}`);
    }
  }
}
