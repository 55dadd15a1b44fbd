// =============================================================================
// Pipeline Schemas: Stage outputs passed between services
// =============================================================================

import type { DocumentBoundary, PageImage, TokenUsage } from "./common.schema.js";

export interface PreProcessingResult {
  pages: PageImage[];
  totalPages: number;
  overallQuality: number;
  processingTimeMs: number;
  metadata: Record<string, unknown>;
}

export interface SplittingResult {
  boundaries: DocumentBoundary[];
  strategy: string;
  confidence: number;
  model?: string;
  usage?: TokenUsage;
}

export interface ClassificationCandidate {
  documentTypeId: string;
  documentTypeCode: string;
  confidence: number;
  reasoning: string;
}

export interface ClassificationResult {
  bestMatch: ClassificationCandidate | null;
  /** Ordered best-first; the best match, when present, is the first entry */
  candidates: ClassificationCandidate[];
  confidence: number;
  reasoning: string;
  model?: string;
  usage?: TokenUsage;
  metadata: Record<string, unknown>;
}

export interface ExtractionResult {
  fields: Record<string, unknown>;
  confidence: Record<string, number>;
  metadata: Record<string, unknown>;
  model?: string;
  usage?: TokenUsage;
}

export function emptyExtractionResult(metadata: Record<string, unknown> = {}): ExtractionResult {
  return { fields: {}, confidence: {}, metadata };
}
