// =============================================================================
// PipelineContext: Job-scoped data carrier passed through the stages
// =============================================================================

import type { DocumentBoundary, FileReference, PageImage } from "../domain/common.schema.js";
import type { CatalogField, DocumentType } from "../domain/catalog.schema.js";
import type { DocumentResult, ValidationResult } from "../domain/job.schema.js";
import {
  adHocToDocumentType,
  type InlineFieldDefinition,
  type ProcessRequest,
} from "../domain/request.schema.js";
import type {
  ClassificationResult,
  ExtractionResult,
  PreProcessingResult,
  SplittingResult,
} from "../domain/pipeline.schema.js";
import { JobCancelledError } from "../errors.js";

/** Everything that belongs to the document currently being processed. */
export interface DocumentWorkingState {
  readonly index: number;
  readonly boundary: DocumentBoundary;
  readonly pages: PageImage[];
  readonly startedAt: number;
  classification?: ClassificationResult;
  resolvedFields: CatalogField[];
  extraction?: ExtractionResult;
  validationResults: ValidationResult[];
}

/** Pages `startPage..endPage`, 1-based and inclusive. */
export function slicePages(pages: readonly PageImage[], boundary: DocumentBoundary): PageImage[] {
  return pages.slice(boundary.startPage - 1, boundary.endPage);
}

export class PipelineContext {
  // ── Request (immutable) ──────────────────────────────────────────────────
  readonly jobId: string;
  readonly sourceType: string;
  readonly sourceReference: string;
  readonly filename?: string;
  readonly expectedType?: string;
  readonly expectedNature?: string;
  readonly splittingStrategy?: string;
  readonly tenantId?: string;
  readonly correlationId?: string;
  readonly tags: Readonly<Record<string, string>>;
  readonly targetFieldCodes: readonly string[];
  readonly inlineFields: readonly InlineFieldDefinition[];
  /** Request-scoped types, converted once so their ids stay stable per job */
  readonly adHocDocumentTypes: readonly DocumentType[];
  readonly signal: AbortSignal;

  // ── Artifacts ─────────────────────────────────────────────────────────────
  fileReference?: FileReference;
  preprocessingResult?: PreProcessingResult;
  splittingResult?: SplittingResult;
  readonly documentResults: DocumentResult[] = [];
  totalTokensUsed = 0;
  totalCostUsd = 0;

  private current?: DocumentWorkingState;

  constructor(jobId: string, request: ProcessRequest, signal: AbortSignal) {
    this.jobId = jobId;
    this.sourceType = request.sourceType;
    this.sourceReference = request.sourceReference;
    this.filename = request.filename;
    this.expectedType = request.expectedType;
    this.expectedNature = request.expectedNature;
    this.splittingStrategy = request.splittingStrategy;
    this.tenantId = request.tenantId;
    this.correlationId = request.correlationId;
    this.tags = { ...request.tags };
    this.targetFieldCodes = [...(request.targetSchema?.fieldCodes ?? [])];
    this.inlineFields = [...(request.targetSchema?.inlineFields ?? [])];
    this.adHocDocumentTypes = request.documentTypes.map(adHocToDocumentType);
    this.signal = signal;
  }

  /** Fresh working state for the next document; nothing carries over. */
  beginDocument(index: number, boundary: DocumentBoundary): DocumentWorkingState {
    this.current = {
      index,
      boundary,
      pages: slicePages(this.preprocessingResult?.pages ?? [], boundary),
      startedAt: Date.now(),
      resolvedFields: [],
      validationResults: [],
    };
    return this.current;
  }

  /** @throws Error when called outside a document iteration */
  get document(): DocumentWorkingState {
    if (!this.current) throw new Error("No document is being processed");
    return this.current;
  }

  /** @throws JobCancelledError once the job's signal has been aborted */
  throwIfCancelled(): void {
    if (this.signal.aborted) throw new JobCancelledError(this.jobId);
  }
}
