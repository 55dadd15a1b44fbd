// =============================================================================
// ResultStoragePort: Jobs and document results
// =============================================================================

import type { PaginatedResult } from "../domain/common.schema.js";
import type {
  AnalyticsSummary,
  DocumentResult,
  JobQuery,
  ProcessingJob,
} from "../domain/job.schema.js";

export interface ResultStoragePort {
  /** Create or replace a job record */
  saveJob(job: ProcessingJob): Promise<ProcessingJob>;

  getJob(jobId: string): Promise<ProcessingJob | null>;

  findJobs(query?: JobQuery): Promise<PaginatedResult<ProcessingJob>>;

  countJobs(query?: Omit<JobQuery, "limit" | "offset">): Promise<number>;

  /** Deletes the job and its document results */
  deleteJob(jobId: string): Promise<boolean>;

  saveDocumentResult(result: DocumentResult): Promise<DocumentResult>;

  getDocumentResult(resultId: string): Promise<DocumentResult | null>;

  /** Results of one job, ordered by document index */
  getDocumentResults(jobId: string): Promise<DocumentResult[]>;

  getAnalyticsSummary(query?: Omit<JobQuery, "limit" | "offset">): Promise<AnalyticsSummary>;
}
