// =============================================================================
// pagewise: Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────────────────

export { createProcessingEngine } from "./engine.js";
export type { ProcessingEngine, ProcessingEngineOptions } from "./engine.js";

// ─────────────────────────────────────────────────────────────────────────────
// Configuration, logging, errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  DEFAULT_SUPPORTED_MIME_TYPES,
  PagewiseConfigSchema,
  envVarName,
  getModel,
  loadConfig,
} from "./config.js";
export type { ModelStage, PagewiseConfig, PagewiseConfigInput } from "./config.js";

export { consoleSink, createLogger, silentLogger } from "./logging.js";
export type { LogEntry, LogLevel, LogSink, Logger, LoggerOptions } from "./logging.js";

export {
  CatalogError,
  ClassificationConfidenceTooLowError,
  ClassificationError,
  ConfigurationError,
  DocumentTypeAlreadyExistsError,
  DocumentTypeNotFoundError,
  ExtractionError,
  FieldAlreadyExistsError,
  FieldNotFoundError,
  FileSourceError,
  FileTooLargeError,
  IngestionError,
  JobCancelledError,
  JobNotFoundError,
  PageExtractionError,
  PagewiseError,
  PipelineError,
  PreProcessingError,
  QualityTooLowError,
  RequestValidationError,
  SplittingError,
  TargetSchemaResolutionError,
  UnsupportedFileTypeError,
  ValidatorAlreadyExistsError,
  ValidatorNotFoundError,
  errorMessage,
} from "./errors.js";
export type { ErrorContext, PagewiseErrorOptions } from "./errors.js";

// ─────────────────────────────────────────────────────────────────────────────
// Domain
// ─────────────────────────────────────────────────────────────────────────────

export {
  DocumentBoundarySchema,
  DocumentConfidenceSchema,
  DocumentNatureSchema,
  FieldTypeSchema,
  FileReferenceSchema,
  JobStatusSchema,
  PageImageSchema,
  TERMINAL_JOB_STATUSES,
  ValidatorSeveritySchema,
  ValidatorTypeSchema,
  confidenceFromScore,
  isTerminalStatus,
  paginate,
  totalTokens,
  worstConfidence,
} from "./domain/common.schema.js";
export type {
  DocumentBoundary,
  DocumentConfidence,
  DocumentNature,
  FieldType,
  FileReference,
  JobStatus,
  PageImage,
  PageRequest,
  PaginatedResult,
  TokenUsage,
  ValidatorSeverity,
  ValidatorType,
} from "./domain/common.schema.js";

export {
  CatalogFieldSchema,
  CatalogFileDocumentTypeSchema,
  CatalogFileSchema,
  DocumentTypeSchema,
  FIELD_CODE_PATTERN,
  FieldValidationRuleSchema,
  ValidatorDefinitionSchema,
} from "./domain/catalog.schema.js";
export type {
  CatalogField,
  CatalogFieldInput,
  CatalogFile,
  DocumentType,
  DocumentTypeInput,
  FieldValidationRule,
  ValidatorDefinition,
  ValidatorDefinitionInput,
} from "./domain/catalog.schema.js";

export {
  AlternativeClassificationSchema,
  DocumentResultSchema,
  ProcessingJobSchema,
  ProcessingResultSchema,
  ValidationResultSchema,
} from "./domain/job.schema.js";
export type {
  AlternativeClassification,
  AnalyticsSummary,
  DocumentResult,
  JobQuery,
  ProcessingJob,
  ProcessingJobInput,
  ProcessingResult,
  ValidationResult,
  ValidationResultInput,
} from "./domain/job.schema.js";

export {
  AdHocDocumentTypeSchema,
  InlineFieldDefinitionSchema,
  ProcessRequestSchema,
  TargetSchemaSchema,
} from "./domain/request.schema.js";
export type {
  AdHocDocumentType,
  InlineFieldDefinition,
  ProcessRequest,
  ProcessRequestInput,
  TargetSchema,
} from "./domain/request.schema.js";

export { emptyExtractionResult } from "./domain/pipeline.schema.js";
export type {
  ClassificationCandidate,
  ClassificationResult,
  ExtractionResult,
  PreProcessingResult,
  SplittingResult,
} from "./domain/pipeline.schema.js";

// ─────────────────────────────────────────────────────────────────────────────
// Ports (contracts for hexagonal architecture)
// ─────────────────────────────────────────────────────────────────────────────

export type {
  DocumentTypeCatalogPort,
  DocumentTypeQuery,
  FieldCatalogPort,
  FieldQuery,
  ValidatorCatalogPort,
  ValidatorQuery,
} from "./ports/catalog.port.js";
export type { FileMetadata, FileSourcePort } from "./ports/file-source.port.js";
export type { PageConversionOptions, PreProcessorPort } from "./ports/page-processor.port.js";
export type { DocumentSplitterPort } from "./ports/splitter.port.js";
export type { ClassificationHints, ClassifierPort } from "./ports/classifier.port.js";
export type { ExtractionRequest, ExtractorPort } from "./ports/extractor.port.js";
export type { ValidationInput, ValidatorPort } from "./ports/validator.port.js";
export type { ResultStoragePort } from "./ports/result-storage.port.js";
export type { CostEstimatorPort } from "./ports/cost-estimator.port.js";

// ─────────────────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────────────────

export {
  InMemoryDocumentTypeCatalog,
  InMemoryFieldCatalog,
  InMemoryValidatorCatalog,
} from "./adapters/catalog/inmemory-catalog.adapter.js";
export { InMemoryResultStorageAdapter } from "./adapters/storage/inmemory.adapter.js";
export { LocalFileSourceAdapter } from "./adapters/ingestion/local-file-source.adapter.js";
export { UrlFileSourceAdapter } from "./adapters/ingestion/url-file-source.adapter.js";
export type { UrlFileSourceOptions } from "./adapters/ingestion/url-file-source.adapter.js";
export { PassthroughPageProcessor } from "./adapters/preprocessing/passthrough-page-processor.adapter.js";
export {
  PdfPageProcessor,
  type PdfPageProcessorOptions,
} from "./adapters/preprocessing/pdf-page-processor.adapter.js";
export { PageBasedSplitter } from "./adapters/splitting/page-based.splitter.js";
export { WholeDocumentSplitter } from "./adapters/splitting/whole-document.splitter.js";
export { DefaultCostEstimatorAdapter, MODEL_PRICING } from "./adapters/cost/default-cost-estimator.adapter.js";
export type { CostEstimatorOptions } from "./adapters/cost/default-cost-estimator.adapter.js";

export { PROVIDERS, parseModelSpec, resolveModel } from "./adapters/vlm/models.js";
export type { ModelResolver, ParsedModelSpec, ProviderSpec, VlmAdapterOptions } from "./adapters/vlm/models.js";
export { VlmClassifierAdapter } from "./adapters/vlm/vlm-classifier.adapter.js";
export type { VlmClassifierOptions } from "./adapters/vlm/vlm-classifier.adapter.js";
export { VlmExtractorAdapter } from "./adapters/vlm/vlm-extractor.adapter.js";
export type { VlmExtractorOptions } from "./adapters/vlm/vlm-extractor.adapter.js";
export { VlmSplitterAdapter } from "./adapters/vlm/vlm-splitter.adapter.js";
export type { VlmSplitterOptions } from "./adapters/vlm/vlm-splitter.adapter.js";
export { VlmVisualValidator } from "./adapters/vlm/vlm-visual.validator.js";

export { createBuiltinValidators } from "./adapters/validation/index.js";
export { BusinessRuleValidator } from "./adapters/validation/business-rule.validator.js";
export { ChecksumValidator } from "./adapters/validation/checksum.validator.js";
export { CompletenessValidator } from "./adapters/validation/completeness.validator.js";
export { CrossFieldValidator } from "./adapters/validation/cross-field.validator.js";
export { FormatValidator } from "./adapters/validation/format.validator.js";
export { RangeValidator } from "./adapters/validation/range.validator.js";
export { RequiredValidator } from "./adapters/validation/required.validator.js";
export { failResult, passResult } from "./adapters/validation/result.js";

// ─────────────────────────────────────────────────────────────────────────────
// Services & pipeline
// ─────────────────────────────────────────────────────────────────────────────

export { CatalogService } from "./services/catalog.service.js";
export type {
  CatalogLoadCounts,
  CatalogServiceOptions,
  NatureSummary,
  ValidatorTypeInfo,
} from "./services/catalog.service.js";
export { IngestionService } from "./services/ingestion.service.js";
export { PreProcessingService } from "./services/preprocessing.service.js";
export { SplittingService } from "./services/splitting.service.js";
export { ClassificationService } from "./services/classification.service.js";
export { ExtractionService, applyDefaultValues } from "./services/extraction.service.js";
export { ValidationEngine } from "./services/validation-engine.js";
export {
  ValidationService,
  buildFieldValidators,
  computeValidationScore,
  countValidations,
  isValid,
} from "./services/validation.service.js";
export { ResultService } from "./services/result.service.js";
export type { JobProgress, JobStatusUpdate, NewJob } from "./services/result.service.js";

export { FieldResolver, effectiveThreshold } from "./pipeline/field-resolver.js";
export type { FieldResolution, FieldSource } from "./pipeline/field-resolver.js";
export { ProcessingOrchestrator, parseProcessRequest } from "./pipeline/orchestrator.js";
export type { PipelineSteps, ProcessingOrchestratorOptions } from "./pipeline/orchestrator.js";
export type { PipelineStep } from "./pipeline/steps/step.js";
export { PipelineContext } from "./pipeline/context.js";
