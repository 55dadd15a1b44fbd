import { beforeEach, describe, expect, it, vi } from "vitest";
import type { ClassificationResult } from "../../domain/pipeline.schema.js";
import type { DocumentType } from "../../domain/catalog.schema.js";
import { TargetSchemaResolutionError } from "../../errors.js";
import { FieldResolver, effectiveThreshold } from "../field-resolver.js";
import { inMemoryCatalog, recordingLogger, type TestCatalog } from "../../__tests__/helpers/fixtures.js";

function matched(documentType: Pick<DocumentType, "id" | "code">, confidence: number): ClassificationResult {
  const candidate = {
    documentTypeId: documentType.id,
    documentTypeCode: documentType.code,
    confidence,
    reasoning: "",
  };
  return { bestMatch: candidate, candidates: [candidate], confidence, reasoning: "", metadata: {} };
}

describe("effectiveThreshold", () => {
  it("prefers the type's own threshold", () => {
    expect(effectiveThreshold({ classificationConfidenceThreshold: 0.4 }, 0.7)).toBe(0.4);
    expect(effectiveThreshold({ classificationConfidenceThreshold: undefined }, 0.7)).toBe(0.7);
  });
});

describe("FieldResolver", () => {
  let test: TestCatalog;
  let resolver: FieldResolver;
  let invoice: DocumentType;

  beforeEach(async () => {
    test = inMemoryCatalog();
    resolver = new FieldResolver({ catalog: test.catalog, defaultConfidenceThreshold: 0.7 });

    await test.catalog.createField({ code: "invoice_number", displayName: "Invoice number" });
    await test.catalog.createField({ code: "total_amount", displayName: "Total", fieldType: "currency" });
    invoice = await test.catalog.createDocumentType({
      code: "invoice",
      name: "Invoice",
      defaultFieldCodes: ["invoice_number", "total_amount"],
    });
  });

  it("uses inline fields verbatim, ahead of everything else", async () => {
    const resolveFields = vi.spyOn(test.catalog, "resolveFields");
    const getDocumentType = vi.spyOn(test.catalog, "getDocumentType");

    const resolution = await resolver.resolve({
      inlineFields: [
        {
          name: "po_number",
          displayName: "",
          fieldType: "text",
          description: "",
          required: true,
          locationHint: "top right",
        },
      ],
      targetFieldCodes: ["missing_code"],
      classification: matched(invoice, 0.99),
    });

    expect(resolveFields).not.toHaveBeenCalled();
    expect(getDocumentType).not.toHaveBeenCalled();
    expect(resolution.source).toBe("inline");
    expect(resolution.fields).toHaveLength(1);
    expect(resolution.fields[0]).toMatchObject({
      code: "po_number",
      displayName: "po_number",
      required: true,
      locationHint: "top right",
    });
  });

  it("resolves target codes in request order", async () => {
    const resolution = await resolver.resolve({
      inlineFields: [],
      targetFieldCodes: ["total_amount", "invoice_number"],
      classification: matched(invoice, 0.99),
    });

    expect(resolution.source).toBe("target_codes");
    expect(resolution.fields.map((f) => f.code)).toEqual(["total_amount", "invoice_number"]);
  });

  it("throws with every unknown target code", async () => {
    const error = await resolver
      .resolve({ inlineFields: [], targetFieldCodes: ["invoice_number", "missing_code", "other"] })
      .then(() => null, (e: unknown) => e);

    expect(error).toBeInstanceOf(TargetSchemaResolutionError);
    if (error instanceof TargetSchemaResolutionError) {
      expect(error.missingCodes).toEqual(["missing_code", "other"]);
      expect(error.message).toBe("Could not resolve field codes: missing_code, other");
    }
  });

  it("falls back to the matched type's default fields", async () => {
    const resolution = await resolver.resolve({
      inlineFields: [],
      targetFieldCodes: [],
      classification: matched(invoice, 0.7),
    });

    expect(resolution.source).toBe("catalog_defaults");
    expect(resolution.fields.map((f) => f.code)).toEqual(["invoice_number", "total_amount"]);
  });

  it("returns nothing below the threshold and logs it", async () => {
    const { logger, entries } = recordingLogger();
    const quiet = new FieldResolver({ catalog: test.catalog, defaultConfidenceThreshold: 0.7, logger });

    const resolution = await quiet.resolve({
      inlineFields: [],
      targetFieldCodes: [],
      classification: matched(invoice, 0.69),
    });

    expect(resolution).toEqual({ source: "none", fields: [] });
    expect(entries.map((e) => e.event)).toEqual(["fields.below_threshold"]);
    expect(entries[0]?.data).toEqual({ documentTypeCode: "invoice", confidence: 0.69, threshold: 0.7 });
  });

  it("applies a per-type threshold over the default", async () => {
    const lenient = await test.catalog.createDocumentType({
      code: "receipt",
      name: "Receipt",
      defaultFieldCodes: ["total_amount"],
      classificationConfidenceThreshold: 0.3,
    });

    const resolution = await resolver.resolve({
      inlineFields: [],
      targetFieldCodes: [],
      classification: matched(lenient, 0.35),
    });

    expect(resolution.source).toBe("catalog_defaults");
    expect(resolution.fields.map((f) => f.code)).toEqual(["total_amount"]);
  });

  it("returns nothing without a match or for a type outside the catalog", async () => {
    expect(await resolver.resolve({ inlineFields: [], targetFieldCodes: [] })).toEqual({
      source: "none",
      fields: [],
    });
    expect(
      await resolver.resolve({
        inlineFields: [],
        targetFieldCodes: [],
        classification: matched({ id: "ad-hoc-id", code: "custom" }, 0.99),
      }),
    ).toEqual({ source: "none", fields: [] });
  });
});
