// =============================================================================
// VlmClassifierAdapter: Catalog-driven document classification
// =============================================================================

import { generateObject } from "ai";
import { z } from "zod";
import type { ClassificationHints, ClassifierPort } from "../../ports/classifier.port.js";
import type { PageImage } from "../../domain/common.schema.js";
import type { DocumentType } from "../../domain/catalog.schema.js";
import type {
  ClassificationCandidate,
  ClassificationResult,
} from "../../domain/pipeline.schema.js";
import { errorMessage } from "../../errors.js";
import type { Logger } from "../../logging.js";
import { silentLogger } from "../../logging.js";
import { callSettings, type VlmAdapterOptions } from "./models.js";
import { buildPageContent, toTokenUsage } from "./pages.js";

export const ClassificationOutputSchema = z.object({
  documentTypeCode: z.string().describe("Code of the best matching document type"),
  confidence: z.number().min(0).max(1),
  reasoning: z.string(),
  alternatives: z
    .array(
      z.object({
        code: z.string(),
        confidence: z.number().min(0).max(1),
        reasoning: z.string(),
      }),
    )
    .describe("Other plausible types, most likely first"),
});
export type ClassificationOutput = z.infer<typeof ClassificationOutputSchema>;

const SYSTEM_PROMPT = [
  "You are an expert document classification agent.",
  "Analyze document images and classify them into one of the registered document types.",
  "Consider visual layout, logos, headers, formatting, key text and document purpose.",
  "Return the document type code, confidence and reasoning.",
].join("\n");

function describeType(dt: DocumentType): string {
  const lines = [
    `- Code: ${dt.code}`,
    `  Name: ${dt.name}`,
    `  Nature: ${dt.nature}`,
    `  Description: ${dt.description}`,
  ];
  if (dt.visualDescription) lines.push(`  Visual: ${dt.visualDescription}`);
  if (dt.visualCues.length > 0) lines.push(`  Cues: ${dt.visualCues.join(", ")}`);
  if (dt.sampleKeywords.length > 0) lines.push(`  Keywords: ${dt.sampleKeywords.join(", ")}`);
  if (dt.classificationInstructions) {
    lines.push(`  Instructions: ${dt.classificationInstructions}`);
  }
  return lines.join("\n");
}

export function buildClassificationPrompt(
  candidates: readonly DocumentType[],
  hints: ClassificationHints = {},
): string {
  let prompt =
    "Classify this document into one of the following registered types:\n\n" +
    candidates.map(describeType).join("\n\n") +
    "\n\nAnalyze the document image carefully. Consider:\n" +
    "- Visual layout and structure\n" +
    "- Logos, headers, footers and formatting\n" +
    "- Key text content and keywords\n" +
    "- Document nature and purpose\n\n" +
    "Return the best matching document type code, your confidence (0.0-1.0) and reasoning.";

  if (hints.expectedType) {
    prompt += `\n\nHint: The expected document type is '${hints.expectedType}'.`;
  }
  if (hints.expectedNature) {
    prompt += `\n\nHint: The expected nature is '${hints.expectedNature}'.`;
  }
  return prompt;
}

/**
 * Maps model output onto the candidate list. Codes the model invents are
 * dropped; the best match is always the first candidate.
 */
export function toClassificationResult(
  output: ClassificationOutput,
  candidates: readonly DocumentType[],
): Omit<ClassificationResult, "model" | "usage"> {
  const byCode = new Map(candidates.map((dt) => [dt.code, dt]));

  const matched = byCode.get(output.documentTypeCode);
  const bestMatch: ClassificationCandidate | null = matched
    ? {
        documentTypeId: matched.id,
        documentTypeCode: matched.code,
        confidence: output.confidence,
        reasoning: output.reasoning,
      }
    : null;

  const ranked: ClassificationCandidate[] = bestMatch ? [bestMatch] : [];
  for (const alt of output.alternatives) {
    const type = byCode.get(alt.code);
    if (!type || ranked.some((c) => c.documentTypeCode === type.code)) continue;
    ranked.push({
      documentTypeId: type.id,
      documentTypeCode: type.code,
      confidence: alt.confidence,
      reasoning: alt.reasoning,
    });
  }

  return {
    bestMatch,
    candidates: ranked,
    confidence: output.confidence,
    reasoning: output.reasoning,
    metadata: matched ? {} : { unmatchedCode: output.documentTypeCode },
  };
}

export interface VlmClassifierOptions extends VlmAdapterOptions {
  logger?: Logger;
}

export class VlmClassifierAdapter implements ClassifierPort {
  private readonly logger: Logger;

  constructor(private readonly options: VlmClassifierOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async classify(
    pages: PageImage[],
    candidates: DocumentType[],
    hints: ClassificationHints = {},
  ): Promise<ClassificationResult> {
    try {
      const content = await buildPageContent(buildClassificationPrompt(candidates, hints), pages);
      const { object, usage } = await generateObject({
        ...callSettings(this.options),
        schema: ClassificationOutputSchema,
        schemaName: "DocumentClassification",
        system: SYSTEM_PROMPT,
        messages: [{ role: "user", content }],
      });

      return {
        ...toClassificationResult(object, candidates),
        model: this.options.modelName,
        usage: toTokenUsage(usage),
      };
    } catch (error) {
      this.logger.error("classification.vlm_failed", { error: errorMessage(error) });
      return {
        bestMatch: null,
        candidates: [],
        confidence: 0,
        reasoning: `Classification failed: ${errorMessage(error)}`,
        model: this.options.modelName,
        metadata: { error: errorMessage(error) },
      };
    }
  }
}
