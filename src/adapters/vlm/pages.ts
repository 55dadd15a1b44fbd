// =============================================================================
// Page content: Page images as AI SDK message parts
// =============================================================================

import { readFile } from "node:fs/promises";
import type { ImagePart, TextPart, UserContent } from "ai";
import { lookup } from "mime-types";
import type { PageImage, TokenUsage } from "../../domain/common.schema.js";

export async function pageToImagePart(page: PageImage): Promise<ImagePart> {
  const data = await readFile(page.imagePath);
  return {
    type: "image",
    image: new Uint8Array(data),
    mediaType: lookup(page.imagePath) || "image/png",
  };
}

/** Prompt text followed by one labelled image per page. */
export async function buildPageContent(prompt: string, pages: readonly PageImage[]): Promise<UserContent> {
  const parts: Array<TextPart | ImagePart> = [{ type: "text", text: prompt }];
  for (const page of pages) {
    parts.push({ type: "text", text: `Page ${page.pageNumber}:` });
    parts.push(await pageToImagePart(page));
  }
  return parts;
}

export function toTokenUsage(usage: { inputTokens?: number; outputTokens?: number } | undefined): TokenUsage {
  return {
    inputTokens: usage?.inputTokens ?? 0,
    outputTokens: usage?.outputTokens ?? 0,
  };
}

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
  };
}
