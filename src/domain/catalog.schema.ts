// =============================================================================
// Catalog Schemas: Document types, fields and validator definitions
// =============================================================================

import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  DocumentNatureSchema,
  FieldTypeSchema,
  ValidatorSeveritySchema,
  ValidatorTypeSchema,
} from "./common.schema.js";

export const FIELD_CODE_PATTERN = /^[a-z][a-z0-9_]*$/;

const timestamps = {
  createdAt: z.number().default(() => Date.now()),
  updatedAt: z.number().default(() => Date.now()),
};

// ── Fields ──────────────────────────────────────────────────────────────────

export const FieldValidationRuleSchema = z.object({
  ruleType: ValidatorTypeSchema,
  severity: ValidatorSeveritySchema.default("error"),
  config: z.record(z.string(), z.unknown()).default({}),
  message: z.string().default(""),
});
export type FieldValidationRule = z.infer<typeof FieldValidationRuleSchema>;

const catalogFieldBase = z.object({
  id: z.string().default(() => randomUUID()),
  code: z.string().regex(FIELD_CODE_PATTERN, "Field code must match ^[a-z][a-z0-9_]*$"),
  displayName: z.string().min(1),
  fieldType: FieldTypeSchema.default("text"),
  description: z.string().default(""),
  required: z.boolean().default(false),
  defaultValue: z.unknown().optional(),
  formatPattern: z.string().optional(),
  minValue: z.number().optional(),
  maxValue: z.number().optional(),
  allowedValues: z.array(z.string()).optional(),
  locationHint: z.string().default(""),
  validationRules: z.array(FieldValidationRuleSchema).default([]),
  tags: z.array(z.string()).default([]),
  isActive: z.boolean().default(true),
  ...timestamps,
});

export type CatalogField = z.output<typeof catalogFieldBase> & {
  tableColumns?: CatalogField[];
};
export type CatalogFieldInput = z.input<typeof catalogFieldBase> & {
  tableColumns?: CatalogFieldInput[];
};

export const CatalogFieldSchema: z.ZodType<CatalogField, z.ZodTypeDef, CatalogFieldInput> =
  catalogFieldBase.extend({
    tableColumns: z.lazy(() => CatalogFieldSchema.array()).optional(),
  });

// ── Document types ──────────────────────────────────────────────────────────

export const DocumentTypeSchema = z.object({
  id: z.string().default(() => randomUUID()),
  code: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  nature: DocumentNatureSchema.default("other"),
  visualDescription: z.string().default(""),
  visualCues: z.array(z.string()).default([]),
  sampleKeywords: z.array(z.string()).default([]),
  classificationInstructions: z.string().default(""),
  /** Per-type override of the global classification threshold */
  classificationConfidenceThreshold: z.number().min(0).max(1).optional(),
  defaultFieldCodes: z.array(z.string()).default([]),
  extractionInstructions: z.string().default(""),
  validatorIds: z.array(z.string()).default([]),
  version: z.number().int().positive().default(1),
  isActive: z.boolean().default(true),
  tags: z.array(z.string()).default([]),
  supportedLanguages: z.array(z.string()).default(["en"]),
  ...timestamps,
});
export type DocumentType = z.infer<typeof DocumentTypeSchema>;
export type DocumentTypeInput = z.input<typeof DocumentTypeSchema>;

// ── Validators ──────────────────────────────────────────────────────────────

export const ValidatorDefinitionSchema = z.object({
  id: z.string().default(() => randomUUID()),
  code: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  validatorType: ValidatorTypeSchema,
  severity: ValidatorSeveritySchema.default("error"),
  config: z.record(z.string(), z.unknown()).default({}),
  applicableNatures: z.array(DocumentNatureSchema).default([]),
  applicableDocumentTypes: z.array(z.string()).default([]),
  applicableFields: z.array(z.string()).default([]),
  visualPrompt: z.string().default(""),
  visualExpected: z.string().default(""),
  ruleExpression: z.string().default(""),
  isActive: z.boolean().default(true),
  version: z.number().int().positive().default(1),
  ...timestamps,
});
export type ValidatorDefinition = z.infer<typeof ValidatorDefinitionSchema>;
export type ValidatorDefinitionInput = z.input<typeof ValidatorDefinitionSchema>;

// ── Seed file ───────────────────────────────────────────────────────────────

/** Document types in a catalog file may reference validators by code. */
export const CatalogFileDocumentTypeSchema = DocumentTypeSchema.extend({
  validatorCodes: z.array(z.string()).default([]),
});

export const CatalogFileSchema = z.object({
  fields: z.array(CatalogFieldSchema).default([]),
  validators: z.array(ValidatorDefinitionSchema).default([]),
  documentTypes: z.array(CatalogFileDocumentTypeSchema).default([]),
});
export type CatalogFile = z.infer<typeof CatalogFileSchema>;
