// =============================================================================
// ProcessingOrchestrator: Job lifecycle and per-document fan-out
// =============================================================================

import type { JobStatus } from "../domain/common.schema.js";
import type { ProcessingJob, ProcessingResult } from "../domain/job.schema.js";
import {
  ProcessRequestSchema,
  type ProcessRequest,
  type ProcessRequestInput,
} from "../domain/request.schema.js";
import {
  JobCancelledError,
  PagewiseError,
  PipelineError,
  RequestValidationError,
  errorMessage,
} from "../errors.js";
import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";
import type { CatalogService } from "../services/catalog.service.js";
import type { JobProgress, ResultService } from "../services/result.service.js";
import { BackgroundTaskRegistry } from "./background-tasks.js";
import { PipelineContext } from "./context.js";
import type { FieldResolver } from "./field-resolver.js";
import type { PipelineStep } from "./steps/step.js";

export interface PipelineSteps {
  ingestion: PipelineStep;
  preprocessing: PipelineStep;
  splitting: PipelineStep;
  classification: PipelineStep;
  extraction: PipelineStep;
  validation: PipelineStep;
  persistence: PipelineStep;
}

export interface ProcessingOrchestratorOptions {
  results: ResultService;
  catalog: CatalogService;
  fieldResolver: FieldResolver;
  steps: PipelineSteps;
  logger?: Logger;
}

type JobTally = Required<JobProgress>;

/** @throws RequestValidationError listing every problem with the request */
export function parseProcessRequest(input: unknown): ProcessRequest {
  const result = ProcessRequestSchema.safeParse(input);
  if (!result.success) {
    throw new RequestValidationError(
      result.error.issues.map((i) => `${i.path.join(".") || "request"}: ${i.message}`),
    );
  }
  return result.data;
}

/** Start of the progress band for document `index` of `total`. */
export function documentProgress(index: number, total: number): number {
  return 40 + (50 * index) / Math.max(total, 1);
}

export function finalStatus(succeeded: number, failed: number): JobStatus {
  if (failed > 0 && succeeded > 0) return "partially_completed";
  if (failed > 0) return "failed";
  return "completed";
}

function errorDetails(error: unknown): Record<string, unknown> {
  if (error instanceof PagewiseError) return { code: error.code, context: error.context };
  if (error instanceof Error) return { name: error.name };
  return {};
}

/**
 * Drives a job through ingest, preprocess and split, then classifies,
 * extracts, validates and stores each detected document in turn. A failed
 * document is counted and skipped; a failed ingest, preprocess or split
 * fails the job.
 *
 * ```ts
 * const result = await orchestrator.process({
 *   sourceType: "local",
 *   sourceReference: "/data/invoice.png",
 *   targetSchema: { fieldCodes: ["invoice_number", "total_amount"] },
 * });
 * ```
 */
export class ProcessingOrchestrator {
  private readonly results: ResultService;
  private readonly catalog: CatalogService;
  private readonly fieldResolver: FieldResolver;
  private readonly steps: PipelineSteps;
  private readonly logger: Logger;
  private readonly tasks = new BackgroundTaskRegistry();

  constructor(options: ProcessingOrchestratorOptions) {
    this.results = options.results;
    this.catalog = options.catalog;
    this.fieldResolver = options.fieldResolver;
    this.steps = options.steps;
    this.logger = options.logger ?? silentLogger;
  }

  // ── Public API ────────────────────────────────────────────────────────────

  /**
   * Runs the whole pipeline and returns the aggregated result. A cancelled
   * job returns what was stored before the cancel took effect.
   *
   * @throws RequestValidationError before any job is created
   * @throws PipelineError (`PIPELINE_EXECUTION_ERROR`) when a required stage fails
   */
  async process(input: ProcessRequestInput): Promise<ProcessingResult> {
    const request = parseProcessRequest(input);
    const job = await this.createJob(request);
    const log = this.logger.forJob(job.id);

    try {
      await this.tasks.track(job.id, (signal) =>
        this.runPipeline(new PipelineContext(job.id, request, signal)),
      );
    } catch (error) {
      if (error instanceof JobCancelledError) {
        await this.settleCancelled(job.id);
      } else {
        log.error("job.failed", { error: errorMessage(error), ...errorDetails(error) });
        await this.recordFailure(job.id, error);
        throw new PipelineError(`Pipeline failed: ${errorMessage(error)}`, "PIPELINE_EXECUTION_ERROR", {
          context: { jobId: job.id },
          cause: error,
        });
      }
    }

    return this.results.getProcessingResult(job.id);
  }

  /**
   * Creates the job and runs the pipeline in the background. Failures are
   * recorded on the job only.
   *
   * @returns the job id, for polling through the result service
   */
  async submit(input: ProcessRequestInput): Promise<string> {
    const request = parseProcessRequest(input);
    const job = await this.createJob(request);

    this.tasks
      .track(job.id, (signal) => this.runInBackground(job.id, request, signal))
      .catch((error: unknown) => {
        this.logger.forJob(job.id).error("job.failure_not_recorded", { error: errorMessage(error) });
      });
    return job.id;
  }

  /**
   * Marks the job cancelled and signals its running pipeline, which stops
   * at the next stage boundary.
   */
  async cancel(jobId: string): Promise<ProcessingJob> {
    const signalled = this.tasks.abort(jobId);
    const job = await this.results.cancelJob(jobId);
    this.logger.forJob(jobId).info("job.cancel_requested", { running: signalled, status: job.status });
    return job;
  }

  /** Resolves once the job's pipeline has settled; at once when none runs. */
  waitForJob(jobId: string): Promise<void> {
    return this.tasks.wait(jobId);
  }

  /** Waits for every running pipeline. */
  shutdown(): Promise<void> {
    return this.tasks.waitAll();
  }

  get runningJobs(): number {
    return this.tasks.size;
  }

  // ── Pipeline ──────────────────────────────────────────────────────────────

  private createJob(request: ProcessRequest): Promise<ProcessingJob> {
    return this.results.createJob({
      sourceType: request.sourceType,
      sourceReference: request.sourceReference,
      originalFilename: request.filename ?? "",
      tenantId: request.tenantId,
      correlationId: request.correlationId,
      tags: request.tags,
    });
  }

  private async runInBackground(
    jobId: string,
    request: ProcessRequest,
    signal: AbortSignal,
  ): Promise<void> {
    const log = this.logger.forJob(jobId);
    try {
      await this.runPipeline(new PipelineContext(jobId, request, signal));
    } catch (error) {
      if (error instanceof JobCancelledError) {
        await this.settleCancelled(jobId);
        return;
      }
      log.error("job.failed", { error: errorMessage(error), ...errorDetails(error) });
      await this.recordFailure(jobId, error);
    }
  }

  /**
   * A status save that was in flight when the cancel landed may have replaced
   * the cancelled record; writing it again leaves the job terminal.
   */
  private async settleCancelled(jobId: string): Promise<void> {
    const job = await this.results.cancelJob(jobId);
    this.logger.forJob(jobId).info("job.stopped", { reason: "cancelled", status: job.status });
  }

  private async recordFailure(jobId: string, error: unknown): Promise<void> {
    await this.results.updateJobStatus(jobId, "failed", {
      errorMessage: errorMessage(error),
      errorDetails: errorDetails(error),
    });
  }

  private async runPipeline(ctx: PipelineContext): Promise<void> {
    const log = this.logger.forJob(ctx.jobId);
    const tally: JobTally = {
      fileSizeBytes: 0,
      mimeType: "",
      totalPages: 0,
      totalDocumentsDetected: 0,
      documentsProcessed: 0,
      documentsSucceeded: 0,
      documentsFailed: 0,
      totalTokensUsed: 0,
      totalCostUsd: 0,
    };

    const update = async (status: JobStatus, step: string, progress: number): Promise<void> => {
      ctx.throwIfCancelled();
      tally.totalTokensUsed = ctx.totalTokensUsed;
      tally.totalCostUsd = ctx.totalCostUsd;
      const saved = await this.results.updateJobStatus(ctx.jobId, status, {
        currentStep: step,
        progressPercent: progress,
        progress: { ...tally },
      });
      if (saved.status === "cancelled") throw new JobCancelledError(ctx.jobId);
    };

    // ── Required stages ──────────────────────────────────────────────────
    await update("ingesting", "ingest", 10);
    await this.steps.ingestion.execute(ctx);
    if (ctx.fileReference) {
      tally.fileSizeBytes = ctx.fileReference.fileSizeBytes;
      tally.mimeType = ctx.fileReference.mimeType;
    }

    await update("preprocessing", "preprocess", 20);
    await this.steps.preprocessing.execute(ctx);
    tally.totalPages = ctx.preprocessingResult?.totalPages ?? 0;

    await update("splitting", "split", 30);
    await this.steps.splitting.execute(ctx);
    const boundaries = ctx.splittingResult?.boundaries ?? [];
    tally.totalDocumentsDetected = boundaries.length;

    // ── Per-document fan-out ─────────────────────────────────────────────
    const shouldClassify =
      ctx.adHocDocumentTypes.length > 0 ||
      Boolean(ctx.expectedType) ||
      (await this.catalog.listActiveDocumentTypes()).length > 0;

    for (const [index, boundary] of boundaries.entries()) {
      ctx.throwIfCancelled();
      const progress = documentProgress(index, boundaries.length);
      const doc = ctx.beginDocument(index, boundary);

      try {
        if (shouldClassify) {
          await update("classifying", "classify", progress);
          await this.steps.classification.execute(ctx);
        }

        const resolution = await this.fieldResolver.resolve({
          inlineFields: ctx.inlineFields,
          targetFieldCodes: ctx.targetFieldCodes,
          classification: doc.classification,
        });
        doc.resolvedFields = resolution.fields;

        if (doc.resolvedFields.length > 0) {
          await update("extracting", "extract", progress + 15);
          await this.steps.extraction.execute(ctx);
        }

        await update("validating", "validate", progress + 30);
        await this.steps.validation.execute(ctx);
        await this.steps.persistence.execute(ctx);

        tally.documentsSucceeded++;
        log.info("document.completed", {
          documentIndex: index,
          pages: `${boundary.startPage}-${boundary.endPage}`,
          fieldSource: resolution.source,
        });
      } catch (error) {
        if (error instanceof JobCancelledError) throw error;
        tally.documentsFailed++;
        log.error("document.failed", {
          documentIndex: index,
          error: errorMessage(error),
          ...errorDetails(error),
        });
      }
      tally.documentsProcessed++;
    }

    const status = finalStatus(tally.documentsSucceeded, tally.documentsFailed);
    await update(status, "complete", 100);
    log.info("job.finished", {
      status,
      documents: tally.documentsProcessed,
      failed: tally.documentsFailed,
    });
  }
}
