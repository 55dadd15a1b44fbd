// =============================================================================
// Common Schemas: Enumerations and value types shared across modules
// =============================================================================

import { z } from "zod";

export const DocumentNatureSchema = z.enum([
  "identity",
  "financial",
  "legal",
  "medical",
  "government",
  "educational",
  "commercial",
  "insurance",
  "real_estate",
  "hr",
  "correspondence",
  "technical",
  "other",
]);
export type DocumentNature = z.infer<typeof DocumentNatureSchema>;

export const FieldTypeSchema = z.enum([
  "text",
  "number",
  "date",
  "currency",
  "boolean",
  "email",
  "phone",
  "address",
  "table",
  "list",
  "enum",
  "image_region",
]);
export type FieldType = z.infer<typeof FieldTypeSchema>;

export const ValidatorTypeSchema = z.enum([
  "format",
  "range",
  "required",
  "cross_field",
  "visual",
  "business_rule",
  "completeness",
  "checksum",
  "lookup",
]);
export type ValidatorType = z.infer<typeof ValidatorTypeSchema>;

export const ValidatorSeveritySchema = z.enum(["error", "warning", "info"]);
export type ValidatorSeverity = z.infer<typeof ValidatorSeveritySchema>;

export const JobStatusSchema = z.enum([
  "pending",
  "ingesting",
  "preprocessing",
  "splitting",
  "classifying",
  "extracting",
  "validating",
  "completed",
  "failed",
  "partially_completed",
  "cancelled",
]);
export type JobStatus = z.infer<typeof JobStatusSchema>;

export const TERMINAL_JOB_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
  "completed",
  "failed",
  "partially_completed",
  "cancelled",
]);

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.has(status);
}

// ── Confidence bands ────────────────────────────────────────────────────────

export const DocumentConfidenceSchema = z.enum(["high", "medium", "low", "very_low"]);
export type DocumentConfidence = z.infer<typeof DocumentConfidenceSchema>;

export function confidenceFromScore(score: number): DocumentConfidence {
  if (score >= 0.9) return "high";
  if (score >= 0.7) return "medium";
  if (score >= 0.5) return "low";
  return "very_low";
}

const CONFIDENCE_RANK: Record<DocumentConfidence, number> = {
  high: 3,
  medium: 2,
  low: 1,
  very_low: 0,
};

/** Lowest band of the list; "high" when empty. */
export function worstConfidence(levels: readonly DocumentConfidence[]): DocumentConfidence {
  let worst: DocumentConfidence = "high";
  for (const level of levels) {
    if (CONFIDENCE_RANK[level] < CONFIDENCE_RANK[worst]) worst = level;
  }
  return worst;
}

// ── Value types ─────────────────────────────────────────────────────────────

export const PageImageSchema = z.object({
  pageNumber: z.number().int().positive(),
  imagePath: z.string(),
  width: z.number().int().min(0).default(0),
  height: z.number().int().min(0).default(0),
  dpi: z.number().int().positive().default(300),
  rotationApplied: z.number().default(0),
  enhancementsApplied: z.array(z.string()).default([]),
  qualityScore: z.number().min(0).max(1).default(1),
});
export type PageImage = z.infer<typeof PageImageSchema>;

export const FileReferenceSchema = z.object({
  sourceType: z.string(),
  sourceReference: z.string(),
  filename: z.string(),
  mimeType: z.string(),
  fileSizeBytes: z.number().int().min(0).default(0),
  /** Local path of the readable content, when one exists */
  contentPath: z.string().optional(),
  metadata: z.record(z.string(), z.string()).default({}),
});
export type FileReference = z.infer<typeof FileReferenceSchema>;

export const DocumentBoundarySchema = z.object({
  startPage: z.number().int().positive(),
  endPage: z.number().int().positive(),
  confidence: z.number().min(0).max(1).default(1),
  reasoning: z.string().default(""),
  detectedTypeHint: z.string().default(""),
});
export type DocumentBoundary = z.infer<typeof DocumentBoundarySchema>;

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export function totalTokens(usage: TokenUsage | undefined): number {
  return usage ? usage.inputTokens + usage.outputTokens : 0;
}

export interface PaginatedResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

export interface PageRequest {
  limit?: number;
  offset?: number;
}

export function paginate<T>(items: T[], page: PageRequest = {}, defaultLimit = 50): PaginatedResult<T> {
  const offset = Math.max(0, page.offset ?? 0);
  const limit = Math.max(1, page.limit ?? defaultLimit);
  const slice = items.slice(offset, offset + limit);
  return {
    items: slice,
    total: items.length,
    limit,
    offset,
    hasMore: offset + limit < items.length,
  };
}
