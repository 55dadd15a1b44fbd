import { beforeEach, describe, expect, it } from "vitest";
import { InMemoryResultStorageAdapter } from "../../adapters/storage/inmemory.adapter.js";
import { failResult, passResult } from "../../adapters/validation/result.js";
import { DocumentResultSchema, type DocumentResult } from "../../domain/job.schema.js";
import { JobNotFoundError, PagewiseError } from "../../errors.js";
import { ResultService } from "../result.service.js";
import { makeValidator } from "../../__tests__/helpers/fixtures.js";

const mandatory = makeValidator({ code: "e", name: "E", validatorType: "required" });
const warning = makeValidator({ code: "w", name: "W", validatorType: "format", severity: "warning" });
const info = makeValidator({ code: "i", name: "I", validatorType: "format", severity: "info" });

function documentResult(jobId: string, overrides: Partial<DocumentResult> = {}): DocumentResult {
  return DocumentResultSchema.parse({
    jobId,
    documentIndex: 0,
    pageRangeStart: 1,
    pageRangeEnd: 1,
    pageCount: 1,
    ...overrides,
  });
}

describe("ResultService", () => {
  let storage: InMemoryResultStorageAdapter;
  let results: ResultService;

  beforeEach(() => {
    storage = new InMemoryResultStorageAdapter();
    results = new ResultService({ storage });
  });

  it("creates pending jobs", async () => {
    const job = await results.createJob({ sourceType: "local", sourceReference: "/in/a.pdf", tenantId: "t1" });

    expect(job).toMatchObject({
      sourceType: "local",
      sourceReference: "/in/a.pdf",
      tenantId: "t1",
      status: "pending",
      currentStep: "",
      progressPercent: 0,
    });
    expect(job.startedAt).toBeUndefined();
    expect(await results.getJob(job.id)).toEqual(job);
  });

  it("stamps start and completion times", async () => {
    const job = await results.createJob({ sourceType: "local", sourceReference: "/in/a.pdf" });

    const running = await results.updateJobStatus(job.id, "ingesting", { currentStep: "ingest", progressPercent: 10 });
    expect(running.startedAt).toBeDefined();
    expect(running.completedAt).toBeUndefined();

    const done = await results.updateJobStatus(job.id, "completed", {
      currentStep: "complete",
      progressPercent: 140,
      progress: { documentsSucceeded: 2, totalTokensUsed: 900 },
    });
    expect(done.progressPercent).toBe(100);
    expect(done.documentsSucceeded).toBe(2);
    expect(done.totalTokensUsed).toBe(900);
    expect(done.completedAt).toBeDefined();
    expect(done.processingDurationMs).toBeGreaterThanOrEqual(0);
  });

  it("cancels a running job and then ignores further updates", async () => {
    const job = await results.createJob({ sourceType: "local", sourceReference: "/in/a.pdf" });
    await results.updateJobStatus(job.id, "extracting");

    const cancelled = await results.cancelJob(job.id);
    expect(cancelled.status).toBe("cancelled");
    expect(cancelled.currentStep).toBe("cancelled");

    const after = await results.updateJobStatus(job.id, "completed", { progressPercent: 100 });
    expect(after.status).toBe("cancelled");
    expect(after.progressPercent).toBe(0);
  });

  it("leaves a finished job alone when cancelled", async () => {
    const job = await results.createJob({ sourceType: "local", sourceReference: "/in/a.pdf" });
    await results.updateJobStatus(job.id, "failed", { errorMessage: "boom" });

    const same = await results.cancelJob(job.id);
    expect(same.status).toBe("failed");
    expect(same.errorMessage).toBe("boom");
  });

  it("reports unknown jobs", async () => {
    await expect(results.getJob("missing")).rejects.toBeInstanceOf(JobNotFoundError);
    await expect(results.deleteJob("missing")).rejects.toThrow("Processing job not found: missing");
  });

  it("aggregates documents into the processing result", async () => {
    const job = await results.createJob({ sourceType: "local", sourceReference: "/in/a.pdf" });
    await results.saveDocumentResult(
      documentResult(job.id, {
        documentIndex: 1,
        extractedFields: { a: 1, b: 2 },
        validationResults: [passResult(mandatory), failResult(warning, "odd"), failResult(info, "fyi")],
        overallConfidence: "medium",
      }),
    );
    await results.saveDocumentResult(
      documentResult(job.id, {
        documentIndex: 0,
        extractedFields: { c: 3 },
        validationResults: [failResult(mandatory, "missing")],
        overallConfidence: "high",
      }),
    );

    const result = await results.getProcessingResult(job.id);

    expect(result.documents.map((d) => d.documentIndex)).toEqual([0, 1]);
    expect(result.totalFieldsExtracted).toBe(3);
    expect(result.totalValidationsPassed).toBe(1);
    expect(result.totalValidationsFailed).toBe(1);
    expect(result.totalValidationsWarned).toBe(1);
    expect(result.overallConfidence).toBe("medium");
  });

  it("is high confidence with no documents", async () => {
    const job = await results.createJob({ sourceType: "local", sourceReference: "/in/a.pdf" });
    const result = await results.getProcessingResult(job.id);

    expect(result.documents).toEqual([]);
    expect(result.overallConfidence).toBe("high");
  });

  it("finds a document result only under its own job", async () => {
    const job = await results.createJob({ sourceType: "local", sourceReference: "/in/a.pdf" });
    const other = await results.createJob({ sourceType: "local", sourceReference: "/in/b.pdf" });
    const stored = await results.saveDocumentResult(documentResult(job.id));

    expect((await results.getDocumentResult(job.id, stored.id)).id).toBe(stored.id);

    const error = await results
      .getDocumentResult(other.id, stored.id)
      .then(() => null, (e: unknown) => e);
    expect(error).toBeInstanceOf(PagewiseError);
    if (error instanceof PagewiseError) {
      expect(error.code).toBe("DOCUMENT_RESULT_NOT_FOUND");
    }
  });

  it("deletes a job together with its documents", async () => {
    const job = await results.createJob({ sourceType: "local", sourceReference: "/in/a.pdf" });
    await results.saveDocumentResult(documentResult(job.id));

    await results.deleteJob(job.id);

    expect(await storage.getDocumentResults(job.id)).toEqual([]);
    expect((await results.listJobs()).total).toBe(0);
  });

  it("filters jobs and summarizes them", async () => {
    const a = await results.createJob({ sourceType: "local", sourceReference: "/in/a.pdf", tenantId: "t1" });
    await results.createJob({ sourceType: "local", sourceReference: "/in/b.pdf", tenantId: "t2" });
    await results.updateJobStatus(a.id, "completed", { progress: { totalTokensUsed: 500, totalCostUsd: 0.01 } });
    await results.saveDocumentResult(documentResult(a.id, { documentTypeCode: "invoice", validationScore: 0.5 }));
    await results.saveDocumentResult(documentResult(a.id, { documentIndex: 1, validationScore: 1 }));

    const t1 = await results.listJobs({ tenantId: "t1" });
    expect(t1.items.map((j) => j.sourceReference)).toEqual(["/in/a.pdf"]);

    const summary = await results.getAnalytics({ tenantId: "t1" });
    expect(summary).toMatchObject({
      totalJobs: 1,
      jobsByStatus: { completed: 1 },
      totalDocuments: 2,
      documentsByType: { invoice: 1, unclassified: 1 },
      averageValidationScore: 0.75,
      totalTokensUsed: 500,
      totalCostUsd: 0.01,
    });
  });
});
