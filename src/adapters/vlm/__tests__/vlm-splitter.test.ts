import { rm } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { PageImage } from "../../../domain/common.schema.js";
import { VlmSplitterAdapter } from "../vlm-splitter.adapter.js";
import { recordingLogger, writePageImages } from "../../../__tests__/helpers/fixtures.js";

const mocks = vi.hoisted(() => ({ generateObject: vi.fn() }));

vi.mock("ai", () => ({ generateObject: mocks.generateObject }));

const options = { model: "openai:gpt-4o-mini", modelName: "openai:gpt-4o-mini" };

describe("VlmSplitterAdapter", () => {
  let dir: string;
  let pages: PageImage[];

  beforeEach(async () => {
    mocks.generateObject.mockReset();
    ({ dir, pages } = await writePageImages(3));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("cuts where a page pair is a boundary", async () => {
    mocks.generateObject
      .mockResolvedValueOnce({
        object: { isBoundary: true, confidence: 0.8, reasoning: "New letterhead", detectedTypeHint: "invoice" },
        usage: { inputTokens: 700, outputTokens: 20 },
      })
      .mockResolvedValueOnce({
        object: { isBoundary: false, confidence: 0.9, reasoning: "Same table", detectedTypeHint: "" },
        usage: { inputTokens: 700, outputTokens: 20 },
      });

    const result = await new VlmSplitterAdapter(options).detectBoundaries(pages);

    expect(result.boundaries).toEqual([
      { startPage: 1, endPage: 1, confidence: 0.8, reasoning: "New letterhead", detectedTypeHint: "invoice" },
      { startPage: 2, endPage: 3, confidence: 1, reasoning: "Final document segment", detectedTypeHint: "" },
    ]);
    expect(result.strategy).toBe("visual");
    expect(result.confidence).toBeCloseTo(0.9);
    expect(result.usage).toEqual({ inputTokens: 1400, outputTokens: 40 });

    const firstPair = mocks.generateObject.mock.calls[0]?.[0].messages[0].content;
    expect(firstPair[0].text.endsWith("Page 1 → Page 2")).toBe(true);
  });

  it("treats a failed pair as the same document", async () => {
    mocks.generateObject
      .mockRejectedValueOnce(new Error("overloaded"))
      .mockResolvedValueOnce({
        object: { isBoundary: false, confidence: 0.9, reasoning: "Same", detectedTypeHint: "" },
        usage: { inputTokens: 10, outputTokens: 1 },
      });
    const { logger, entries } = recordingLogger();

    const result = await new VlmSplitterAdapter({ ...options, logger }).detectBoundaries(pages);

    expect(result.boundaries.map((b) => [b.startPage, b.endPage])).toEqual([[1, 3]]);
    expect(result.usage).toEqual({ inputTokens: 10, outputTokens: 1 });
    expect(entries).toHaveLength(1);
    expect(entries[0]?.event).toBe("splitting.visual.pair_failed");
    expect(entries[0]?.data).toEqual({ pages: [1, 2], error: "overloaded" });
  });

  it("makes no calls for a single page", async () => {
    const result = await new VlmSplitterAdapter(options).detectBoundaries(pages.slice(0, 1));

    expect(mocks.generateObject).not.toHaveBeenCalled();
    expect(result.boundaries).toEqual([
      { startPage: 1, endPage: 1, confidence: 1, reasoning: "Single page document", detectedTypeHint: "" },
    ]);
    expect(result.confidence).toBe(1);
  });

  it("returns no boundaries for no pages", async () => {
    const result = await new VlmSplitterAdapter(options).detectBoundaries([]);
    expect(result).toEqual({ boundaries: [], strategy: "visual", confidence: 1 });
  });
});
