import { beforeEach, describe, expect, it, vi } from "vitest";
import type { ClassifierPort } from "../../ports/classifier.port.js";
import type { ClassificationCandidate } from "../../domain/pipeline.schema.js";
import { InMemoryDocumentTypeCatalog } from "../../adapters/catalog/inmemory-catalog.adapter.js";
import { ClassificationService } from "../classification.service.js";
import { makeDocumentType, makePages, recordingLogger } from "../../__tests__/helpers/fixtures.js";

function candidate(code: string, confidence: number): ClassificationCandidate {
  return { documentTypeId: `${code}-id`, documentTypeCode: code, confidence, reasoning: "" };
}

describe("ClassificationService", () => {
  let documentTypes: InMemoryDocumentTypeCatalog;

  beforeEach(async () => {
    documentTypes = new InMemoryDocumentTypeCatalog();
    await documentTypes.save(makeDocumentType({ code: "invoice", name: "Invoice", nature: "financial" }));
    await documentTypes.save(makeDocumentType({ code: "passport", name: "Passport", nature: "identity" }));
    await documentTypes.save(
      makeDocumentType({ code: "old_form", name: "Old form", nature: "financial", isActive: false }),
    );
  });

  function service(classify: ClassifierPort["classify"], maxCandidates = 5) {
    const { logger, entries } = recordingLogger();
    return {
      entries,
      service: new ClassificationService({ classifier: { classify }, documentTypes, maxCandidates, logger }),
    };
  }

  describe("buildPool", () => {
    it("puts active catalog types before ad-hoc types", async () => {
      const { service: svc } = service(vi.fn());
      const pool = await svc.buildPool({
        adHocTypes: [makeDocumentType({ code: "memo", name: "Memo" })],
      });
      expect(pool.map((dt) => dt.code)).toEqual(["invoice", "passport", "memo"]);
    });

    it("narrows the pool by nature", async () => {
      const { service: svc } = service(vi.fn());
      const pool = await svc.buildPool({ expectedNature: "identity" });
      expect(pool.map((dt) => dt.code)).toEqual(["passport"]);
    });

    it("ignores an unknown nature and warns", async () => {
      const { service: svc, entries } = service(vi.fn());
      const pool = await svc.buildPool({ expectedNature: "astrology" });

      expect(pool.map((dt) => dt.code)).toEqual(["invoice", "passport"]);
      expect(entries.find((e) => e.event === "classification.unknown_nature")?.data).toEqual({
        nature: "astrology",
      });
    });

    it("synthesizes the expected type when nothing else is left", async () => {
      const { service: svc } = service(vi.fn());
      const pool = await svc.buildPool({ expectedNature: "medical", expectedType: "lab_report" });

      expect(pool).toHaveLength(1);
      expect(pool[0]).toMatchObject({ code: "lab_report", name: "Lab Report", nature: "other" });
    });
  });

  it("passes the pool and the hints to the classifier", async () => {
    const classify = vi.fn<ClassifierPort["classify"]>(async () => ({
      bestMatch: candidate("passport", 0.92),
      candidates: [candidate("passport", 0.92)],
      confidence: 0.92,
      reasoning: "photo page",
      metadata: {},
    }));
    const { service: svc } = service(classify);

    const result = await svc.classify(makePages(1), { expectedType: "passport", expectedNature: "identity" });

    expect(result.bestMatch?.documentTypeCode).toBe("passport");
    const [, pool, hints] = classify.mock.calls[0] ?? [];
    expect(pool?.map((dt) => dt.code)).toEqual(["passport"]);
    expect(hints).toEqual({ expectedType: "passport", expectedNature: "identity" });
  });

  it("does not call the classifier with an empty pool", async () => {
    const classify = vi.fn<ClassifierPort["classify"]>();
    const { service: svc } = service(classify);

    const result = await svc.classify(makePages(1), { expectedNature: "medical" });

    expect(classify).not.toHaveBeenCalled();
    expect(result).toEqual({
      bestMatch: null,
      candidates: [],
      confidence: 0,
      reasoning: "No document types available",
      metadata: {},
    });
  });

  it("caps alternatives after the best match", async () => {
    const candidates = [
      candidate("invoice", 0.6),
      candidate("receipt", 0.2),
      candidate("statement", 0.1),
      candidate("memo", 0.05),
    ];
    const classify = vi.fn<ClassifierPort["classify"]>(async () => ({
      bestMatch: candidates[0] ?? null,
      candidates,
      confidence: 0.6,
      reasoning: "",
      metadata: {},
    }));
    const { service: svc } = service(classify, 2);

    const result = await svc.classify(makePages(1));
    expect(result.candidates.map((c) => c.documentTypeCode)).toEqual(["invoice", "receipt", "statement"]);
  });

  it("caps candidates without a best match at the limit", async () => {
    const candidates = [candidate("invoice", 0.3), candidate("receipt", 0.2), candidate("memo", 0.1)];
    const classify = vi.fn<ClassifierPort["classify"]>(async () => ({
      bestMatch: null,
      candidates,
      confidence: 0.3,
      reasoning: "",
      metadata: {},
    }));
    const { service: svc } = service(classify, 2);

    const result = await svc.classify(makePages(1));
    expect(result.candidates.map((c) => c.documentTypeCode)).toEqual(["invoice", "receipt"]);
  });

  it("turns a classifier failure into an empty result", async () => {
    const classify = vi.fn<ClassifierPort["classify"]>(async () => {
      throw new Error("rate limited");
    });
    const { service: svc, entries } = service(classify);

    const result = await svc.classify(makePages(1));

    expect(result).toEqual({
      bestMatch: null,
      candidates: [],
      confidence: 0,
      reasoning: "Classification failed: rate limited",
      metadata: { error: "rate limited" },
    });
    expect(entries.find((e) => e.event === "classification.failed")?.level).toBe("error");
  });
});
