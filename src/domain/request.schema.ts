// =============================================================================
// Request Schemas: Processing requests and request-scoped definitions
// =============================================================================

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { DocumentNatureSchema, FieldTypeSchema } from "./common.schema.js";
import type { CatalogField, DocumentType } from "./catalog.schema.js";

export const InlineFieldDefinitionSchema = z.object({
  name: z.string().min(1),
  displayName: z.string().default(""),
  fieldType: FieldTypeSchema.default("text"),
  description: z.string().default(""),
  required: z.boolean().default(false),
  locationHint: z.string().default(""),
  defaultValue: z.unknown().optional(),
});
export type InlineFieldDefinition = z.infer<typeof InlineFieldDefinitionSchema>;

export const TargetSchemaSchema = z.object({
  fieldCodes: z.array(z.string().min(1)).default([]),
  inlineFields: z.array(InlineFieldDefinitionSchema).default([]),
});
export type TargetSchema = z.infer<typeof TargetSchemaSchema>;

export const AdHocDocumentTypeSchema = z.object({
  code: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  nature: DocumentNatureSchema.default("other"),
  visualDescription: z.string().default(""),
  visualCues: z.array(z.string()).default([]),
  sampleKeywords: z.array(z.string()).default([]),
  classificationInstructions: z.string().default(""),
});
export type AdHocDocumentType = z.infer<typeof AdHocDocumentTypeSchema>;

export const ProcessRequestSchema = z.object({
  sourceType: z.string().min(1).describe("Registered file source, e.g. 'local' or 'url'"),
  sourceReference: z.string().min(1).describe("Path or URL of the file"),
  filename: z.string().optional(),
  expectedType: z.string().min(1).optional().describe("Expected document type code"),
  expectedNature: z.string().optional().describe("Narrows the classification pool"),
  splittingStrategy: z.string().optional(),
  targetSchema: TargetSchemaSchema.optional(),
  documentTypes: z.array(AdHocDocumentTypeSchema).default([]),
  tenantId: z.string().optional(),
  correlationId: z.string().optional(),
  tags: z.record(z.string(), z.string()).default({}),
});
export type ProcessRequest = z.infer<typeof ProcessRequestSchema>;
export type ProcessRequestInput = z.input<typeof ProcessRequestSchema>;

// ── Conversions ─────────────────────────────────────────────────────────────

/** Inline definitions become catalog-shaped fields whose code is the name. */
export function inlineFieldToCatalogField(field: InlineFieldDefinition): CatalogField {
  const now = Date.now();
  return {
    id: randomUUID(),
    code: field.name,
    displayName: field.displayName || field.name,
    fieldType: field.fieldType,
    description: field.description,
    required: field.required,
    defaultValue: field.defaultValue,
    locationHint: field.locationHint,
    validationRules: [],
    tags: [],
    isActive: true,
    createdAt: now,
    updatedAt: now,
  };
}

function transientDocumentType(
  fields: Pick<DocumentType, "code" | "name"> & Partial<DocumentType>,
): DocumentType {
  const now = Date.now();
  return {
    id: randomUUID(),
    description: "",
    nature: "other",
    visualDescription: "",
    visualCues: [],
    sampleKeywords: [],
    classificationInstructions: "",
    defaultFieldCodes: [],
    extractionInstructions: "",
    validatorIds: [],
    version: 1,
    isActive: true,
    tags: [],
    supportedLanguages: ["en"],
    createdAt: now,
    updatedAt: now,
    ...fields,
  };
}

export function adHocToDocumentType(adHoc: AdHocDocumentType): DocumentType {
  return transientDocumentType({ ...adHoc });
}

/** `bank_statement` → a type named "Bank Statement" of nature "other". */
export function synthesizeDocumentType(code: string): DocumentType {
  const name = code
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(" ");
  return transientDocumentType({ code, name: name || code });
}
