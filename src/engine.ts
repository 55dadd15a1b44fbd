// =============================================================================
// pagewise: Configuration-driven engine assembly
// =============================================================================
//
// Zero-config:
//   const engine = createProcessingEngine()
//   await engine.catalog.loadCatalogFile("./catalog.json")
//   const result = await engine.process({ sourceType: "local", sourceReference: "./scan.png" })
//
// Every port can be swapped through the options:
//   createProcessingEngine({ storage: myStorage, extractor: myExtractor })
//
// =============================================================================

import { getModel, loadConfig, type ModelStage, type PagewiseConfig, type PagewiseConfigInput } from "./config.js";
import type { DocumentTypeCatalogPort, FieldCatalogPort, ValidatorCatalogPort } from "./ports/catalog.port.js";
import type { ClassifierPort } from "./ports/classifier.port.js";
import type { CostEstimatorPort } from "./ports/cost-estimator.port.js";
import type { ExtractorPort } from "./ports/extractor.port.js";
import type { FileSourcePort } from "./ports/file-source.port.js";
import type { PreProcessorPort } from "./ports/page-processor.port.js";
import type { ResultStoragePort } from "./ports/result-storage.port.js";
import type { DocumentSplitterPort } from "./ports/splitter.port.js";
import type { ValidatorPort } from "./ports/validator.port.js";
import {
  InMemoryDocumentTypeCatalog,
  InMemoryFieldCatalog,
  InMemoryValidatorCatalog,
} from "./adapters/catalog/inmemory-catalog.adapter.js";
import { DefaultCostEstimatorAdapter } from "./adapters/cost/default-cost-estimator.adapter.js";
import { LocalFileSourceAdapter } from "./adapters/ingestion/local-file-source.adapter.js";
import { UrlFileSourceAdapter } from "./adapters/ingestion/url-file-source.adapter.js";
import { PdfPageProcessor } from "./adapters/preprocessing/pdf-page-processor.adapter.js";
import { PageBasedSplitter } from "./adapters/splitting/page-based.splitter.js";
import { WholeDocumentSplitter } from "./adapters/splitting/whole-document.splitter.js";
import { InMemoryResultStorageAdapter } from "./adapters/storage/inmemory.adapter.js";
import { createBuiltinValidators } from "./adapters/validation/index.js";
import { resolveModel as defaultResolveModel, type ModelResolver, type VlmAdapterOptions } from "./adapters/vlm/models.js";
import { VlmClassifierAdapter } from "./adapters/vlm/vlm-classifier.adapter.js";
import { VlmExtractorAdapter } from "./adapters/vlm/vlm-extractor.adapter.js";
import { VlmSplitterAdapter } from "./adapters/vlm/vlm-splitter.adapter.js";
import type { Logger } from "./logging.js";
import { createLogger } from "./logging.js";
import type { ProcessingJob, ProcessingResult } from "./domain/job.schema.js";
import type { ProcessRequestInput } from "./domain/request.schema.js";
import { CatalogService } from "./services/catalog.service.js";
import { ClassificationService } from "./services/classification.service.js";
import { ExtractionService } from "./services/extraction.service.js";
import { IngestionService } from "./services/ingestion.service.js";
import { PreProcessingService } from "./services/preprocessing.service.js";
import { ResultService } from "./services/result.service.js";
import { SplittingService } from "./services/splitting.service.js";
import { ValidationEngine } from "./services/validation-engine.js";
import { ValidationService } from "./services/validation.service.js";
import { FieldResolver } from "./pipeline/field-resolver.js";
import { ProcessingOrchestrator } from "./pipeline/orchestrator.js";
import { ClassificationStep } from "./pipeline/steps/classification.step.js";
import { ExtractionStep } from "./pipeline/steps/extraction.step.js";
import { IngestionStep } from "./pipeline/steps/ingestion.step.js";
import { PersistenceStep } from "./pipeline/steps/persistence.step.js";
import { PreProcessingStep } from "./pipeline/steps/preprocessing.step.js";
import { SplittingStep } from "./pipeline/steps/splitting.step.js";
import { ValidationStep } from "./pipeline/steps/validation.step.js";

export interface ProcessingEngineOptions {
  /** Overrides on top of schema defaults and PAGEWISE_* variables */
  config?: PagewiseConfigInput;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Turns "provider:model" strings into AI SDK models */
  resolveModel?: ModelResolver;

  documentTypes?: DocumentTypeCatalogPort;
  fields?: FieldCatalogPort;
  validatorCatalog?: ValidatorCatalogPort;
  storage?: ResultStoragePort;
  /** Replace the local and url sources */
  sources?: FileSourcePort[];
  /** Defaults to PDF rasterizing with image passthrough */
  preprocessor?: PreProcessorPort;
  /** Added to page_based, whole_document and visual */
  splitters?: DocumentSplitterPort[];
  classifier?: ClassifierPort;
  extractor?: ExtractorPort;
  /** Added to the built-in handlers; a type may be registered once */
  validators?: ValidatorPort[];
  costEstimator?: CostEstimatorPort;
}

export interface ProcessingEngine {
  readonly config: PagewiseConfig;
  readonly logger: Logger;
  readonly catalog: CatalogService;
  readonly results: ResultService;
  readonly ingestion: IngestionService;
  readonly splitting: SplittingService;
  readonly validationEngine: ValidationEngine;
  readonly orchestrator: ProcessingOrchestrator;

  process(request: ProcessRequestInput): Promise<ProcessingResult>;
  submit(request: ProcessRequestInput): Promise<string>;
  cancel(jobId: string): Promise<ProcessingJob>;
  waitForJob(jobId: string): Promise<void>;
  shutdown(): Promise<void>;
}

/** Builds every service from configuration; options replace single ports. */
export function createProcessingEngine(options: ProcessingEngineOptions = {}): ProcessingEngine {
  const config = loadConfig(options.config, options.env);
  const logger = options.logger ?? createLogger();
  const resolve = options.resolveModel ?? defaultResolveModel;

  const vlm = (stage: ModelStage, timeoutMs: number, maxRetries?: number): VlmAdapterOptions => {
    const modelName = getModel(config, stage);
    return {
      model: resolve(modelName),
      modelName,
      temperature: config.defaultTemperature,
      maxRetries,
      timeoutMs,
    };
  };

  // ── Catalog & results ────────────────────────────────────────────────────
  const documentTypes = options.documentTypes ?? new InMemoryDocumentTypeCatalog();
  const fields = options.fields ?? new InMemoryFieldCatalog();
  const validatorCatalog = options.validatorCatalog ?? new InMemoryValidatorCatalog();
  const catalog = new CatalogService({ documentTypes, fields, validators: validatorCatalog, logger });
  const results = new ResultService({
    storage: options.storage ?? new InMemoryResultStorageAdapter(),
    logger,
  });
  const costs = options.costEstimator ?? new DefaultCostEstimatorAdapter({ logger });

  // ── Stage services ───────────────────────────────────────────────────────
  const ingestion = new IngestionService({
    sources: options.sources ?? [
      new LocalFileSourceAdapter(),
      new UrlFileSourceAdapter({ tempDir: config.tempDir, timeoutMs: config.ingestionTimeoutMs }),
    ],
    config,
    logger,
  });

  const preprocessing = new PreProcessingService({
    processor: options.preprocessor ?? new PdfPageProcessor({ logger }),
    config,
    logger,
  });

  const splitting = new SplittingService({
    strategies: [
      new PageBasedSplitter(),
      new WholeDocumentSplitter(),
      new VlmSplitterAdapter({ ...vlm("splitting", config.splittingTimeoutMs), logger }),
      ...(options.splitters ?? []),
    ],
    defaultStrategy: config.defaultSplittingStrategy,
    logger,
  });

  const classification = new ClassificationService({
    classifier:
      options.classifier ??
      new VlmClassifierAdapter({
        ...vlm("classification", config.classificationTimeoutMs, config.classificationRetries),
        logger,
      }),
    documentTypes,
    maxCandidates: config.maxClassificationCandidates,
    logger,
  });

  const extraction = new ExtractionService({
    extractor:
      options.extractor ??
      new VlmExtractorAdapter({
        ...vlm("extraction", config.extractionTimeoutMs, config.extractionRetries),
        singlePassThreshold: config.extractionSinglePassThreshold,
        batchSize: config.extractionBatchSize,
        logger,
      }),
    logger,
  });

  const validationEngine = new ValidationEngine({
    handlers: [
      ...createBuiltinValidators(vlm("validation", config.validationTimeoutMs)),
      ...(options.validators ?? []),
    ],
    logger,
  });
  const validation = new ValidationService({
    engine: validationEngine,
    documentTypes,
    validators: validatorCatalog,
    logger,
  });

  // ── Orchestration ────────────────────────────────────────────────────────
  const orchestrator = new ProcessingOrchestrator({
    results,
    catalog,
    fieldResolver: new FieldResolver({
      catalog,
      defaultConfidenceThreshold: config.defaultConfidenceThreshold,
      logger,
    }),
    steps: {
      ingestion: new IngestionStep(ingestion),
      preprocessing: new PreProcessingStep(preprocessing),
      splitting: new SplittingStep(splitting, costs),
      classification: new ClassificationStep(classification),
      extraction: new ExtractionStep(extraction, documentTypes),
      validation: new ValidationStep(validation),
      persistence: new PersistenceStep(results, costs),
    },
    logger,
  });

  return {
    config,
    logger,
    catalog,
    results,
    ingestion,
    splitting,
    validationEngine,
    orchestrator,
    process: (request) => orchestrator.process(request),
    submit: (request) => orchestrator.submit(request),
    cancel: (jobId) => orchestrator.cancel(jobId),
    waitForJob: (jobId) => orchestrator.waitForJob(jobId),
    shutdown: () => orchestrator.shutdown(),
  };
}
