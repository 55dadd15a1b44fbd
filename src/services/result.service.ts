// =============================================================================
// ResultService: Job lifecycle records and aggregated results
// =============================================================================

import type { ResultStoragePort } from "../ports/result-storage.port.js";
import {
  isTerminalStatus,
  worstConfidence,
  type JobStatus,
  type PaginatedResult,
} from "../domain/common.schema.js";
import {
  ProcessingJobSchema,
  type AnalyticsSummary,
  type DocumentResult,
  type JobQuery,
  type ProcessingJob,
  type ProcessingJobInput,
  type ProcessingResult,
} from "../domain/job.schema.js";
import { JobNotFoundError, PagewiseError } from "../errors.js";
import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";
import { countValidations } from "./validation.service.js";

export interface ResultServiceOptions {
  storage: ResultStoragePort;
  logger?: Logger;
}

export type NewJob = Pick<ProcessingJobInput, "sourceType" | "sourceReference"> &
  Partial<Pick<ProcessingJobInput, "originalFilename" | "tenantId" | "correlationId" | "tags">>;

/** Counters and file facts the orchestrator writes along with a status. */
export type JobProgress = Partial<
  Pick<
    ProcessingJob,
    | "fileSizeBytes"
    | "mimeType"
    | "totalPages"
    | "totalDocumentsDetected"
    | "documentsProcessed"
    | "documentsSucceeded"
    | "documentsFailed"
    | "totalTokensUsed"
    | "totalCostUsd"
  >
>;

export interface JobStatusUpdate {
  currentStep?: string;
  /** Clamped to [0, 100] */
  progressPercent?: number;
  errorMessage?: string;
  errorDetails?: Record<string, unknown>;
  progress?: JobProgress;
}

export class ResultService {
  private readonly storage: ResultStoragePort;
  private readonly logger: Logger;

  constructor(options: ResultServiceOptions) {
    this.storage = options.storage;
    this.logger = options.logger ?? silentLogger;
  }

  // ── Jobs ──────────────────────────────────────────────────────────────────

  async createJob(input: NewJob): Promise<ProcessingJob> {
    const job = ProcessingJobSchema.parse({ ...input, status: "pending" });
    const saved = await this.storage.saveJob(job);
    this.logger.forJob(saved.id).info("job.created", {
      sourceType: saved.sourceType,
      sourceReference: saved.sourceReference,
    });
    return saved;
  }

  async getJob(jobId: string): Promise<ProcessingJob> {
    const job = await this.storage.getJob(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  /**
   * Moves the job to `status`. `startedAt` is set on the first non-pending
   * status; `completedAt` and the duration are set on a terminal one. A
   * cancelled job is returned unchanged.
   */
  async updateJobStatus(
    jobId: string,
    status: JobStatus,
    update: JobStatusUpdate = {},
  ): Promise<ProcessingJob> {
    const job = await this.getJob(jobId);
    if (job.status === "cancelled") return job;

    const now = Date.now();
    const next: ProcessingJob = { ...job, ...update.progress, status, updatedAt: now };

    if (update.currentStep !== undefined) next.currentStep = update.currentStep;
    if (update.progressPercent !== undefined) {
      next.progressPercent = Math.min(100, Math.max(0, update.progressPercent));
    }
    if (update.errorMessage !== undefined) next.errorMessage = update.errorMessage;
    if (update.errorDetails !== undefined) next.errorDetails = update.errorDetails;

    if (status !== "pending" && next.startedAt === undefined) next.startedAt = now;
    if (isTerminalStatus(status)) {
      next.completedAt = now;
      next.processingDurationMs = now - (next.startedAt ?? now);
    }

    const saved = await this.storage.saveJob(next);
    this.logger.forJob(jobId).debug("job.status", {
      status,
      step: saved.currentStep,
      progress: saved.progressPercent,
    });
    return saved;
  }

  /** Marks a non-terminal job cancelled; a finished job is returned as is. */
  async cancelJob(jobId: string): Promise<ProcessingJob> {
    const job = await this.getJob(jobId);
    if (isTerminalStatus(job.status)) return job;
    const cancelled = await this.updateJobStatus(jobId, "cancelled", { currentStep: "cancelled" });
    this.logger.forJob(jobId).info("job.cancelled", { previousStatus: job.status });
    return cancelled;
  }

  async deleteJob(jobId: string): Promise<void> {
    if (!(await this.storage.deleteJob(jobId))) throw new JobNotFoundError(jobId);
  }

  listJobs(query: JobQuery = {}): Promise<PaginatedResult<ProcessingJob>> {
    return this.storage.findJobs(query);
  }

  // ── Results ───────────────────────────────────────────────────────────────

  saveDocumentResult(result: DocumentResult): Promise<DocumentResult> {
    return this.storage.saveDocumentResult(result);
  }

  async getProcessingResult(jobId: string): Promise<ProcessingResult> {
    const job = await this.getJob(jobId);
    const documents = await this.storage.getDocumentResults(jobId);

    let totalFieldsExtracted = 0;
    let passed = 0;
    let failed = 0;
    let warned = 0;
    for (const doc of documents) {
      totalFieldsExtracted += Object.keys(doc.extractedFields).length;
      const counts = countValidations(doc.validationResults);
      passed += counts.passed;
      failed += counts.failed;
      warned += counts.warned;
    }

    return {
      job,
      documents,
      totalFieldsExtracted,
      totalValidationsPassed: passed,
      totalValidationsFailed: failed,
      totalValidationsWarned: warned,
      overallConfidence: worstConfidence(documents.map((d) => d.overallConfidence)),
    };
  }

  async getDocumentResult(jobId: string, resultId: string): Promise<DocumentResult> {
    const result = await this.storage.getDocumentResult(resultId);
    if (!result || result.jobId !== jobId) {
      throw new PagewiseError("DOCUMENT_RESULT_NOT_FOUND", `Document result not found: ${jobId}/${resultId}`, {
        context: { jobId, resultId },
      });
    }
    return result;
  }

  getAnalytics(query: Omit<JobQuery, "limit" | "offset"> = {}): Promise<AnalyticsSummary> {
    return this.storage.getAnalyticsSummary(query);
  }
}
