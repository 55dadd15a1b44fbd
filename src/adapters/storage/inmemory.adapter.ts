// =============================================================================
// InMemoryResultStorageAdapter: Map-backed job and document result storage
// =============================================================================

import type { ResultStoragePort } from "../../ports/result-storage.port.js";
import type { PaginatedResult } from "../../domain/common.schema.js";
import type {
  AnalyticsSummary,
  DocumentResult,
  JobQuery,
  ProcessingJob,
} from "../../domain/job.schema.js";

type JobFilter = Omit<JobQuery, "limit" | "offset">;

function matches(job: ProcessingJob, filter: JobFilter): boolean {
  if (filter.status !== undefined && job.status !== filter.status) return false;
  if (filter.tenantId !== undefined && job.tenantId !== filter.tenantId) return false;
  if (filter.createdAfter !== undefined && job.createdAt < filter.createdAfter) return false;
  if (filter.createdBefore !== undefined && job.createdAt > filter.createdBefore) return false;
  return true;
}

export class InMemoryResultStorageAdapter implements ResultStoragePort {
  private readonly jobs = new Map<string, ProcessingJob>();
  private readonly results = new Map<string, DocumentResult>();

  async saveJob(job: ProcessingJob): Promise<ProcessingJob> {
    const stored = structuredClone(job);
    this.jobs.set(job.id, stored);
    return structuredClone(stored);
  }

  async getJob(jobId: string): Promise<ProcessingJob | null> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  async findJobs(query: JobQuery = {}): Promise<PaginatedResult<ProcessingJob>> {
    // Newest first
    const items = Array.from(this.jobs.values())
      .filter((job) => matches(job, query))
      .sort((a, b) => b.createdAt - a.createdAt);

    const total = items.length;
    const offset = query.offset ?? 0;
    const limit = query.limit ?? 50;
    const paged = items.slice(offset, offset + limit);

    return {
      items: paged.map((job) => structuredClone(job)),
      total,
      limit,
      offset,
      hasMore: offset + limit < total,
    };
  }

  async countJobs(query: JobFilter = {}): Promise<number> {
    let count = 0;
    for (const job of this.jobs.values()) {
      if (matches(job, query)) count++;
    }
    return count;
  }

  async deleteJob(jobId: string): Promise<boolean> {
    for (const [id, result] of this.results) {
      if (result.jobId === jobId) this.results.delete(id);
    }
    return this.jobs.delete(jobId);
  }

  async saveDocumentResult(result: DocumentResult): Promise<DocumentResult> {
    const stored = structuredClone(result);
    this.results.set(result.id, stored);
    return structuredClone(stored);
  }

  async getDocumentResult(resultId: string): Promise<DocumentResult | null> {
    const result = this.results.get(resultId);
    return result ? structuredClone(result) : null;
  }

  async getDocumentResults(jobId: string): Promise<DocumentResult[]> {
    return Array.from(this.results.values())
      .filter((r) => r.jobId === jobId)
      .sort((a, b) => a.documentIndex - b.documentIndex)
      .map((r) => structuredClone(r));
  }

  async getAnalyticsSummary(query: JobFilter = {}): Promise<AnalyticsSummary> {
    const jobs = Array.from(this.jobs.values()).filter((job) => matches(job, query));
    const jobIds = new Set(jobs.map((job) => job.id));
    const documents = Array.from(this.results.values()).filter((r) => jobIds.has(r.jobId));

    const jobsByStatus: AnalyticsSummary["jobsByStatus"] = {};
    let durationTotal = 0;
    let durationCount = 0;
    let totalTokensUsed = 0;
    let totalCostUsd = 0;
    for (const job of jobs) {
      jobsByStatus[job.status] = (jobsByStatus[job.status] ?? 0) + 1;
      if (job.processingDurationMs !== undefined) {
        durationTotal += job.processingDurationMs;
        durationCount++;
      }
      totalTokensUsed += job.totalTokensUsed;
      totalCostUsd += job.totalCostUsd;
    }

    const documentsByType: Record<string, number> = {};
    let scoreTotal = 0;
    for (const doc of documents) {
      const code = doc.documentTypeCode ?? "unclassified";
      documentsByType[code] = (documentsByType[code] ?? 0) + 1;
      scoreTotal += doc.validationScore;
    }

    return {
      totalJobs: jobs.length,
      jobsByStatus,
      totalDocuments: documents.length,
      documentsByType,
      averageProcessingMs: durationCount > 0 ? durationTotal / durationCount : 0,
      averageValidationScore: documents.length > 0 ? scoreTotal / documents.length : 0,
      totalTokensUsed,
      totalCostUsd,
    };
  }

  /** Drop every job and result */
  clear(): void {
    this.jobs.clear();
    this.results.clear();
  }
}
