// =============================================================================
// ValidationService: Document-type and field-rule validators per document
// =============================================================================

import { randomUUID } from "node:crypto";
import type { DocumentTypeCatalogPort, ValidatorCatalogPort } from "../ports/catalog.port.js";
import type { PageImage } from "../domain/common.schema.js";
import type { CatalogField, ValidatorDefinition } from "../domain/catalog.schema.js";
import type { ValidationResult } from "../domain/job.schema.js";
import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";
import type { ValidationEngine } from "./validation-engine.js";

export interface ValidationServiceOptions {
  engine: ValidationEngine;
  documentTypes: DocumentTypeCatalogPort;
  validators: ValidatorCatalogPort;
  logger?: Logger;
}

export interface ValidateOptions {
  pages: PageImage[];
  fields: Record<string, unknown>;
  /** Classified type; its catalog validators run when it is a catalog entry */
  documentTypeId?: string;
  documentTypeCode?: string;
  resolvedFields?: readonly CatalogField[];
}

/** Share of passed results; 1 when nothing ran. */
export function computeValidationScore(results: readonly ValidationResult[]): number {
  if (results.length === 0) return 1;
  return results.filter((r) => r.passed).length / results.length;
}

/** Only failing error-severity results make a document invalid. */
export function isValid(results: readonly ValidationResult[]): boolean {
  return results.every((r) => r.passed || r.severity !== "error");
}

export interface ValidationCounts {
  passed: number;
  failed: number;
  warned: number;
}

export function countValidations(results: readonly ValidationResult[]): ValidationCounts {
  let passed = 0;
  let failed = 0;
  let warned = 0;
  for (const r of results) {
    if (r.passed) passed++;
    else if (r.severity === "error") failed++;
    else if (r.severity === "warning") warned++;
  }
  return { passed, failed, warned };
}

/** One definition per embedded rule, scoped to its field. */
export function buildFieldValidators(fields: readonly CatalogField[]): ValidatorDefinition[] {
  const now = Date.now();
  return fields.flatMap((field) =>
    field.validationRules.map((rule) => ({
      id: randomUUID(),
      code: `${field.code}_${rule.ruleType}`,
      name: rule.message || `${field.displayName} ${rule.ruleType} check`,
      description: rule.message,
      validatorType: rule.ruleType,
      severity: rule.severity,
      config: rule.config,
      applicableNatures: [],
      applicableDocumentTypes: [],
      applicableFields: [field.code],
      visualPrompt: "",
      visualExpected: "",
      ruleExpression: typeof rule.config.expression === "string" ? rule.config.expression : "",
      isActive: true,
      version: 1,
      createdAt: now,
      updatedAt: now,
    })),
  );
}

export class ValidationService {
  private readonly engine: ValidationEngine;
  private readonly documentTypes: DocumentTypeCatalogPort;
  private readonly validators: ValidatorCatalogPort;
  private readonly logger: Logger;

  constructor(options: ValidationServiceOptions) {
    this.engine = options.engine;
    this.documentTypes = options.documentTypes;
    this.validators = options.validators;
    this.logger = options.logger ?? silentLogger;
  }

  async validate(options: ValidateOptions): Promise<ValidationResult[]> {
    const definitions: ValidatorDefinition[] = [];

    if (options.documentTypeId) {
      const documentType = await this.documentTypes.findById(options.documentTypeId);
      if (documentType && documentType.validatorIds.length > 0) {
        definitions.push(...(await this.validators.findByIds(documentType.validatorIds)));
      }
    }
    definitions.push(...buildFieldValidators(options.resolvedFields ?? []));

    const results = await this.engine.run(definitions, {
      fields: options.fields,
      pages: options.pages,
      documentTypeCode: options.documentTypeCode,
    });

    this.logger.info("validation.completed", { ...countValidations(results) });
    return results;
  }
}
