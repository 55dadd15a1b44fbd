// =============================================================================
// Job Schemas: Processing jobs, document results and aggregates
// =============================================================================

import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  DocumentConfidenceSchema,
  JobStatusSchema,
  ValidatorSeveritySchema,
} from "./common.schema.js";

export const ProcessingJobSchema = z.object({
  id: z.string().default(() => randomUUID()),
  sourceType: z.string(),
  sourceReference: z.string(),
  originalFilename: z.string().default(""),
  fileSizeBytes: z.number().int().min(0).default(0),
  mimeType: z.string().default(""),
  status: JobStatusSchema.default("pending"),
  currentStep: z.string().default(""),
  progressPercent: z.number().min(0).max(100).default(0),
  totalPages: z.number().int().min(0).default(0),
  totalDocumentsDetected: z.number().int().min(0).default(0),
  documentsProcessed: z.number().int().min(0).default(0),
  documentsSucceeded: z.number().int().min(0).default(0),
  documentsFailed: z.number().int().min(0).default(0),
  startedAt: z.number().optional(),
  completedAt: z.number().optional(),
  processingDurationMs: z.number().min(0).optional(),
  totalTokensUsed: z.number().int().min(0).default(0),
  totalCostUsd: z.number().min(0).default(0),
  errorMessage: z.string().optional(),
  errorDetails: z.record(z.string(), z.unknown()).optional(),
  tenantId: z.string().optional(),
  correlationId: z.string().optional(),
  tags: z.record(z.string(), z.string()).default({}),
  createdAt: z.number().default(() => Date.now()),
  updatedAt: z.number().default(() => Date.now()),
});
export type ProcessingJob = z.infer<typeof ProcessingJobSchema>;
export type ProcessingJobInput = z.input<typeof ProcessingJobSchema>;

export const ValidationResultSchema = z.object({
  validatorId: z.string(),
  validatorCode: z.string(),
  validatorName: z.string().default(""),
  passed: z.boolean(),
  severity: ValidatorSeveritySchema.default("error"),
  message: z.string().default(""),
  fieldName: z.string().optional(),
  expectedValue: z.string().optional(),
  actualValue: z.string().optional(),
  details: z.record(z.string(), z.unknown()).default({}),
});
export type ValidationResult = z.infer<typeof ValidationResultSchema>;
export type ValidationResultInput = z.input<typeof ValidationResultSchema>;

export const AlternativeClassificationSchema = z.object({
  code: z.string(),
  confidence: z.number().min(0).max(1),
  reasoning: z.string().default(""),
});
export type AlternativeClassification = z.infer<typeof AlternativeClassificationSchema>;

export const DocumentResultSchema = z.object({
  id: z.string().default(() => randomUUID()),
  jobId: z.string(),
  documentIndex: z.number().int().min(0),
  documentTypeId: z.string().optional(),
  documentTypeCode: z.string().optional(),
  classificationConfidence: z.number().min(0).max(1).default(0),
  classificationReasoning: z.string().default(""),
  alternativeClassifications: z.array(AlternativeClassificationSchema).default([]),
  pageRangeStart: z.number().int().min(0),
  pageRangeEnd: z.number().int().min(0),
  pageCount: z.number().int().min(0),
  extractedFields: z.record(z.string(), z.unknown()).default({}),
  extractionConfidence: z.record(z.string(), z.number()).default({}),
  extractionMetadata: z.record(z.string(), z.unknown()).default({}),
  validationResults: z.array(ValidationResultSchema).default([]),
  isValid: z.boolean().default(true),
  validationScore: z.number().min(0).max(1).default(1),
  overallConfidence: DocumentConfidenceSchema.default("high"),
  processingDurationMs: z.number().min(0).default(0),
  tokensUsed: z.number().int().min(0).default(0),
  costUsd: z.number().min(0).default(0),
  createdAt: z.number().default(() => Date.now()),
});
export type DocumentResult = z.infer<typeof DocumentResultSchema>;

export const ProcessingResultSchema = z.object({
  job: ProcessingJobSchema,
  documents: z.array(DocumentResultSchema),
  totalFieldsExtracted: z.number().int().min(0),
  totalValidationsPassed: z.number().int().min(0),
  totalValidationsFailed: z.number().int().min(0),
  totalValidationsWarned: z.number().int().min(0),
  overallConfidence: DocumentConfidenceSchema,
});
export type ProcessingResult = z.infer<typeof ProcessingResultSchema>;

// ── Queries & analytics ─────────────────────────────────────────────────────

export interface JobQuery {
  status?: ProcessingJob["status"];
  tenantId?: string;
  /** Inclusive lower bound on `createdAt` */
  createdAfter?: number;
  /** Inclusive upper bound on `createdAt` */
  createdBefore?: number;
  limit?: number;
  offset?: number;
}

export interface AnalyticsSummary {
  totalJobs: number;
  jobsByStatus: Partial<Record<ProcessingJob["status"], number>>;
  totalDocuments: number;
  documentsByType: Record<string, number>;
  averageProcessingMs: number;
  averageValidationScore: number;
  totalTokensUsed: number;
  totalCostUsd: number;
}
