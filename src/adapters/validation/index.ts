// =============================================================================
// Built-in validators
// =============================================================================

import type { ValidatorPort } from "../../ports/validator.port.js";
import { VlmVisualValidator } from "../vlm/vlm-visual.validator.js";
import type { VlmAdapterOptions } from "../vlm/models.js";
import { BusinessRuleValidator } from "./business-rule.validator.js";
import { ChecksumValidator } from "./checksum.validator.js";
import { CompletenessValidator } from "./completeness.validator.js";
import { CrossFieldValidator } from "./cross-field.validator.js";
import { FormatValidator } from "./format.validator.js";
import { RangeValidator } from "./range.validator.js";
import { RequiredValidator } from "./required.validator.js";

export { BusinessRuleValidator, evaluateExpression, resolveToken } from "./business-rule.validator.js";
export { ChecksumValidator, luhnValid, mod97Valid } from "./checksum.validator.js";
export { CompletenessValidator } from "./completeness.validator.js";
export { CrossFieldValidator } from "./cross-field.validator.js";
export { FormatValidator, EMAIL_PATTERN, PHONE_PATTERN, IBAN_PATTERN } from "./format.validator.js";
export { RangeValidator } from "./range.validator.js";
export { RequiredValidator } from "./required.validator.js";

/**
 * Every built-in handler. The visual handler needs a model and is only
 * included when `visual` options are given.
 */
export function createBuiltinValidators(visual?: VlmAdapterOptions): ValidatorPort[] {
  const validators: ValidatorPort[] = [
    new FormatValidator(),
    new RangeValidator(),
    new RequiredValidator(),
    new CrossFieldValidator(),
    new BusinessRuleValidator(),
    new CompletenessValidator(),
    new ChecksumValidator(),
  ];
  if (visual) validators.push(new VlmVisualValidator(visual));
  return validators;
}
