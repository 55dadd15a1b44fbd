/**
 * Structured error hierarchy for Pagewise.
 *
 * Every error extends {@link PagewiseError} and carries a stable `code`
 * plus a `context` record, so callers branch on the code instead of the
 * message:
 *
 * ```ts
 * try {
 *   await orchestrator.process(request);
 * } catch (e) {
 *   if (e instanceof PagewiseError && e.code === "PIPELINE_EXECUTION_ERROR") { ... }
 * }
 * ```
 *
 * @module errors
 */

export type ErrorContext = Record<string, unknown>;

export interface PagewiseErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

/** Base error for all Pagewise errors. */
export class PagewiseError extends Error {
  readonly code: string;
  readonly context: ErrorContext;

  constructor(code: string, message: string, options: PagewiseErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PagewiseError";
    this.code = code;
    this.context = options.context ?? {};
  }

  toJSON(): { code: string; message: string; context: ErrorContext } {
    return { code: this.code, message: this.message, context: this.context };
  }
}

// ── Catalog ──────────────────────────────────────────────────────────────────

export class CatalogError extends PagewiseError {
  constructor(message: string, code = "CATALOG_ERROR", options?: PagewiseErrorOptions) {
    super(code, message, options);
    this.name = "CatalogError";
  }
}

export class DocumentTypeNotFoundError extends CatalogError {
  constructor(identifier: string) {
    super(`Document type not found: ${identifier}`, "DOCUMENT_TYPE_NOT_FOUND", {
      context: { identifier },
    });
    this.name = "DocumentTypeNotFoundError";
  }
}

export class DocumentTypeAlreadyExistsError extends CatalogError {
  constructor(code: string) {
    super(`Document type already exists with code: ${code}`, "DOCUMENT_TYPE_DUPLICATE", {
      context: { documentTypeCode: code },
    });
    this.name = "DocumentTypeAlreadyExistsError";
  }
}

export class FieldNotFoundError extends CatalogError {
  constructor(identifier: string) {
    super(`Field not found: ${identifier}`, "FIELD_NOT_FOUND", { context: { identifier } });
    this.name = "FieldNotFoundError";
  }
}

export class FieldAlreadyExistsError extends CatalogError {
  constructor(code: string) {
    super(`Field already exists with code: ${code}`, "FIELD_DUPLICATE", {
      context: { fieldCode: code },
    });
    this.name = "FieldAlreadyExistsError";
  }
}

export class ValidatorNotFoundError extends CatalogError {
  constructor(identifier: string) {
    super(`Validator not found: ${identifier}`, "VALIDATOR_NOT_FOUND", { context: { identifier } });
    this.name = "ValidatorNotFoundError";
  }
}

export class ValidatorAlreadyExistsError extends CatalogError {
  constructor(code: string) {
    super(`Validator already exists with code: ${code}`, "VALIDATOR_DUPLICATE", {
      context: { validatorCode: code },
    });
    this.name = "ValidatorAlreadyExistsError";
  }
}

/** Thrown when requested catalog field codes cannot all be resolved. */
export class TargetSchemaResolutionError extends CatalogError {
  readonly missingCodes: string[];
  constructor(missingCodes: string[]) {
    super(
      `Could not resolve field codes: ${missingCodes.join(", ")}`,
      "TARGET_SCHEMA_RESOLUTION_ERROR",
      { context: { missingCodes } },
    );
    this.name = "TargetSchemaResolutionError";
    this.missingCodes = missingCodes;
  }
}

// ── Ingestion ────────────────────────────────────────────────────────────────

export class IngestionError extends PagewiseError {
  constructor(message: string, code = "INGESTION_ERROR", options?: PagewiseErrorOptions) {
    super(code, message, options);
    this.name = "IngestionError";
  }
}

export class FileSourceError extends IngestionError {
  constructor(sourceType: string, reference: string, reason = "", cause?: unknown) {
    super(
      `Failed to read file from ${sourceType}: ${reference}. ${reason}`.trim(),
      "FILE_SOURCE_ERROR",
      { context: { sourceType, reference }, cause },
    );
    this.name = "FileSourceError";
  }
}

export class UnsupportedFileTypeError extends IngestionError {
  constructor(mimeType: string, supported: readonly string[]) {
    super(`Unsupported file type: ${mimeType}`, "UNSUPPORTED_FILE_TYPE", {
      context: { mimeType, supported: [...supported] },
    });
    this.name = "UnsupportedFileTypeError";
  }
}

export class FileTooLargeError extends IngestionError {
  constructor(fileSizeMb: number, maxSizeMb: number) {
    super(
      `File size ${fileSizeMb.toFixed(1)}MB exceeds maximum ${maxSizeMb.toFixed(1)}MB`,
      "FILE_TOO_LARGE",
      { context: { fileSizeMb, maxSizeMb } },
    );
    this.name = "FileTooLargeError";
  }
}

// ── Pre-processing ───────────────────────────────────────────────────────────

export class PreProcessingError extends PagewiseError {
  constructor(message: string, code = "PREPROCESSING_ERROR", options?: PagewiseErrorOptions) {
    super(code, message, options);
    this.name = "PreProcessingError";
  }
}

export class PageExtractionError extends PreProcessingError {
  constructor(reason: string, context: ErrorContext = {}) {
    super(`Failed to extract pages: ${reason}`, "PAGE_EXTRACTION_ERROR", { context });
    this.name = "PageExtractionError";
  }
}

export class QualityTooLowError extends PreProcessingError {
  constructor(qualityScore: number, threshold: number) {
    super(
      `Document quality ${qualityScore.toFixed(2)} is below threshold ${threshold.toFixed(2)}`,
      "QUALITY_TOO_LOW",
      { context: { qualityScore, threshold } },
    );
    this.name = "QualityTooLowError";
  }
}

// ── Splitting / classification / extraction ─────────────────────────────────

export class SplittingError extends PagewiseError {
  constructor(message: string, code = "SPLITTING_ERROR", options?: PagewiseErrorOptions) {
    super(code, message, options);
    this.name = "SplittingError";
  }
}

export class ClassificationError extends PagewiseError {
  constructor(message: string, code = "CLASSIFICATION_ERROR", options?: PagewiseErrorOptions) {
    super(code, message, options);
    this.name = "ClassificationError";
  }
}

/**
 * Below-threshold classification. The pipeline runs in lenient mode and
 * never throws this itself; it is exported for callers that want to
 * enforce the threshold on a {@link ProcessingResult}.
 */
export class ClassificationConfidenceTooLowError extends ClassificationError {
  constructor(confidence: number, threshold: number) {
    super(
      `Classification confidence ${confidence.toFixed(2)} is below threshold ${threshold.toFixed(2)}`,
      "CLASSIFICATION_CONFIDENCE_LOW",
      { context: { confidence, threshold } },
    );
    this.name = "ClassificationConfidenceTooLowError";
  }
}

export class ExtractionError extends PagewiseError {
  constructor(message: string, code = "EXTRACTION_ERROR", options?: PagewiseErrorOptions) {
    super(code, message, options);
    this.name = "ExtractionError";
  }
}

// ── Pipeline / jobs ──────────────────────────────────────────────────────────

export class PipelineError extends PagewiseError {
  constructor(message: string, code = "PIPELINE_ERROR", options?: PagewiseErrorOptions) {
    super(code, message, options);
    this.name = "PipelineError";
  }
}

export class JobNotFoundError extends PagewiseError {
  constructor(jobId: string) {
    super("JOB_NOT_FOUND", `Processing job not found: ${jobId}`, { context: { jobId } });
    this.name = "JobNotFoundError";
  }
}

/** Raised inside a running pipeline once its job has been cancelled. */
export class JobCancelledError extends PagewiseError {
  constructor(jobId: string) {
    super("JOB_CANCELLED", `Processing job was cancelled: ${jobId}`, { context: { jobId } });
    this.name = "JobCancelledError";
  }
}

/** Unknown registry keys, duplicate registrations, bad settings. */
export class ConfigurationError extends PagewiseError {
  constructor(message: string, context: ErrorContext = {}) {
    super("CONFIGURATION_ERROR", message, { context });
    this.name = "ConfigurationError";
  }
}

export class RequestValidationError extends PagewiseError {
  readonly issues: string[];
  constructor(issues: string[]) {
    super("REQUEST_VALIDATION_ERROR", `Invalid processing request: ${issues.join("; ")}`, {
      context: { issues },
    });
    this.name = "RequestValidationError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
