import { describe, expect, it } from "vitest";
import type { ClassificationResult } from "../../domain/pipeline.schema.js";
import { InMemoryResultStorageAdapter } from "../../adapters/storage/inmemory.adapter.js";
import { DefaultCostEstimatorAdapter } from "../../adapters/cost/default-cost-estimator.adapter.js";
import { JobCancelledError } from "../../errors.js";
import { ResultService } from "../../services/result.service.js";
import { PipelineContext, slicePages } from "../context.js";
import { PersistenceStep, overallConfidenceScore } from "../steps/persistence.step.js";
import { parseProcessRequest } from "../orchestrator.js";
import { makePages, makeValidator } from "../../__tests__/helpers/fixtures.js";
import { failResult, passResult } from "../../adapters/validation/result.js";

function classification(confidences: Array<[string, number]>): ClassificationResult {
  const candidates = confidences.map(([code, confidence]) => ({
    documentTypeId: `${code}-id`,
    documentTypeCode: code,
    confidence,
    reasoning: `${code} reasoning`,
  }));
  return {
    bestMatch: candidates[0] ?? null,
    candidates,
    confidence: candidates[0]?.confidence ?? 0,
    reasoning: "overall",
    metadata: {},
  };
}

describe("slicePages", () => {
  it("takes the 1-based inclusive range", () => {
    const pages = makePages(7);
    const slice = slicePages(pages, {
      startPage: 4,
      endPage: 7,
      confidence: 1,
      reasoning: "",
      detectedTypeHint: "",
    });
    expect(slice.map((p) => p.pageNumber)).toEqual([4, 5, 6, 7]);
  });
});

describe("PipelineContext", () => {
  it("starts every document from a clean slate", () => {
    const ctx = new PipelineContext(
      "job-1",
      parseProcessRequest({ sourceType: "local", sourceReference: "/in/scan.pdf" }),
      new AbortController().signal,
    );
    ctx.preprocessingResult = {
      pages: makePages(3),
      totalPages: 3,
      overallQuality: 1,
      processingTimeMs: 0,
      metadata: {},
    };

    const first = ctx.beginDocument(0, { startPage: 1, endPage: 2, confidence: 1, reasoning: "", detectedTypeHint: "" });
    first.classification = classification([["invoice", 0.9]]);

    const second = ctx.beginDocument(1, { startPage: 3, endPage: 3, confidence: 1, reasoning: "", detectedTypeHint: "" });
    expect(second.classification).toBeUndefined();
    expect(second.extraction).toBeUndefined();
    expect(second.validationResults).toEqual([]);
    expect(ctx.document.pages.map((p) => p.pageNumber)).toEqual([3]);
  });

  it("throws once its signal is aborted", () => {
    const controller = new AbortController();
    const ctx = new PipelineContext(
      "job-1",
      parseProcessRequest({ sourceType: "local", sourceReference: "/in/scan.pdf" }),
      controller.signal,
    );

    expect(() => ctx.throwIfCancelled()).not.toThrow();
    controller.abort();
    expect(() => ctx.throwIfCancelled()).toThrow(JobCancelledError);
  });
});

describe("overallConfidenceScore", () => {
  it("is 1 with no match and a perfect validation score", () => {
    expect(overallConfidenceScore(undefined, 1)).toBe(1);
    expect(overallConfidenceScore(classification([]), 1)).toBe(1);
  });

  it("averages the match confidence with an imperfect validation score", () => {
    expect(overallConfidenceScore(classification([["invoice", 0.9]]), 1)).toBe(0.9);
    expect(overallConfidenceScore(classification([["invoice", 0.9]]), 0.5)).toBeCloseTo(0.7, 10);
    expect(overallConfidenceScore(undefined, 0.25)).toBe(0.25);
  });
});

describe("PersistenceStep", () => {
  it("stores the document with alternatives, validation outcome and cost", async () => {
    const storage = new InMemoryResultStorageAdapter();
    const results = new ResultService({ storage });
    const step = new PersistenceStep(results, new DefaultCostEstimatorAdapter());

    const ctx = new PipelineContext(
      "job-1",
      parseProcessRequest({ sourceType: "local", sourceReference: "/in/scan.pdf" }),
      new AbortController().signal,
    );
    ctx.preprocessingResult = {
      pages: makePages(4),
      totalPages: 4,
      overallQuality: 1,
      processingTimeMs: 0,
      metadata: {},
    };
    const doc = ctx.beginDocument(1, { startPage: 2, endPage: 4, confidence: 1, reasoning: "", detectedTypeHint: "" });
    doc.classification = {
      ...classification([
        ["invoice", 0.8],
        ["receipt", 0.15],
      ]),
      model: "openai:gpt-4o",
      usage: { inputTokens: 1000, outputTokens: 100 },
    };
    doc.extraction = {
      fields: { total: "12.50" },
      confidence: { total: 0.9 },
      metadata: { strategy: "single_pass" },
      model: "openai:gpt-4o",
      usage: { inputTokens: 2000, outputTokens: 200 },
    };
    const rule = makeValidator({ code: "total_present", name: "Total present", validatorType: "required" });
    const format = makeValidator({ code: "total_format", name: "Total format", validatorType: "format" });
    doc.validationResults = [passResult(rule), failResult(format, "bad format")];

    await step.execute(ctx);

    const [stored] = await storage.getDocumentResults("job-1");
    expect(stored).toMatchObject({
      jobId: "job-1",
      documentIndex: 1,
      documentTypeId: "invoice-id",
      documentTypeCode: "invoice",
      classificationConfidence: 0.8,
      classificationReasoning: "invoice reasoning",
      alternativeClassifications: [{ code: "receipt", confidence: 0.15, reasoning: "receipt reasoning" }],
      pageRangeStart: 2,
      pageRangeEnd: 4,
      pageCount: 3,
      extractedFields: { total: "12.50" },
      extractionConfidence: { total: 0.9 },
      extractionMetadata: { strategy: "single_pass" },
      isValid: false,
      validationScore: 0.5,
      // mean(0.8, 0.5) = 0.65
      overallConfidence: "low",
      tokensUsed: 3300,
    });
    // gpt-4o: 3000 input at 2.50/M plus 300 output at 10.00/M
    expect(stored?.costUsd).toBeCloseTo(0.0105, 10);
    expect(ctx.totalTokensUsed).toBe(3300);
    expect(ctx.documentResults).toHaveLength(1);
  });

  it("keeps no alternatives when there is no match", async () => {
    const storage = new InMemoryResultStorageAdapter();
    const step = new PersistenceStep(new ResultService({ storage }), new DefaultCostEstimatorAdapter());
    const ctx = new PipelineContext(
      "job-2",
      parseProcessRequest({ sourceType: "local", sourceReference: "/in/scan.png" }),
      new AbortController().signal,
    );
    ctx.preprocessingResult = { pages: makePages(1), totalPages: 1, overallQuality: 1, processingTimeMs: 0, metadata: {} };
    const doc = ctx.beginDocument(0, { startPage: 1, endPage: 1, confidence: 1, reasoning: "", detectedTypeHint: "" });
    doc.classification = {
      bestMatch: null,
      candidates: [{ documentTypeId: "x", documentTypeCode: "x", confidence: 0.2, reasoning: "" }],
      confidence: 0.2,
      reasoning: "Nothing fits",
      metadata: {},
    };

    await step.execute(ctx);

    const [stored] = await storage.getDocumentResults("job-2");
    expect(stored?.documentTypeCode).toBeUndefined();
    expect(stored?.classificationConfidence).toBe(0);
    expect(stored?.classificationReasoning).toBe("Nothing fits");
    expect(stored?.alternativeClassifications).toEqual([]);
    expect(stored?.overallConfidence).toBe("high");
    expect(stored?.tokensUsed).toBe(0);
  });
});
