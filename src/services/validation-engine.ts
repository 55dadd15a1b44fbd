// =============================================================================
// ValidationEngine: Validator-type registry and batch execution
// =============================================================================

import type { ValidationInput, ValidatorPort } from "../ports/validator.port.js";
import type { ValidatorType } from "../domain/common.schema.js";
import type { ValidatorDefinition } from "../domain/catalog.schema.js";
import type { ValidationResult } from "../domain/job.schema.js";
import { ConfigurationError, errorMessage } from "../errors.js";
import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";
import { failResult } from "../adapters/validation/result.js";

export interface ValidationEngineOptions {
  handlers: readonly ValidatorPort[];
  logger?: Logger;
}

export class ValidationEngine {
  private readonly handlers = new Map<ValidatorType, ValidatorPort>();
  private readonly logger: Logger;

  /** @throws ConfigurationError when two handlers claim the same type */
  constructor(options: ValidationEngineOptions) {
    for (const handler of options.handlers) {
      if (this.handlers.has(handler.validatorType)) {
        throw new ConfigurationError(
          `Duplicate validator handler for type: ${handler.validatorType}`,
          { validatorType: handler.validatorType },
        );
      }
      this.handlers.set(handler.validatorType, handler);
    }
    this.logger = options.logger ?? silentLogger;
  }

  registeredTypes(): ValidatorType[] {
    return Array.from(this.handlers.keys());
  }

  /**
   * Runs each active definition in order. Handler errors and unknown types
   * become failing results; the batch always completes.
   */
  async run(
    definitions: readonly ValidatorDefinition[],
    input: ValidationInput,
  ): Promise<ValidationResult[]> {
    const results: ValidationResult[] = [];
    for (const definition of definitions) {
      if (!definition.isActive) continue;
      results.push(await this.runOne(definition, input));
    }
    return results;
  }

  private async runOne(
    definition: ValidatorDefinition,
    input: ValidationInput,
  ): Promise<ValidationResult> {
    const handler = this.handlers.get(definition.validatorType);
    if (!handler) {
      const registered = this.registeredTypes();
      return failResult(
        definition,
        `No handler for validator type: ${definition.validatorType}. Registered: ${registered.join(", ")}`,
        { details: { validatorType: definition.validatorType, registered } },
      );
    }

    try {
      return await handler.validate(definition, input);
    } catch (error) {
      this.logger.warn("validation.handler_error", {
        validatorCode: definition.code,
        error: errorMessage(error),
      });
      return failResult(definition, `Validator error: ${errorMessage(error)}`, {
        fieldName: definition.applicableFields[0],
      });
    }
  }
}
