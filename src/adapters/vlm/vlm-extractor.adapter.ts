// =============================================================================
// VlmExtractorAdapter: Field-driven extraction, single or multi-pass
// =============================================================================

import { generateObject } from "ai";
import { z } from "zod";
import type { ExtractionRequest, ExtractorPort } from "../../ports/extractor.port.js";
import type { PageImage, TokenUsage } from "../../domain/common.schema.js";
import type { CatalogField } from "../../domain/catalog.schema.js";
import { emptyExtractionResult, type ExtractionResult } from "../../domain/pipeline.schema.js";
import { errorMessage } from "../../errors.js";
import type { Logger } from "../../logging.js";
import { silentLogger } from "../../logging.js";
import { callSettings, type VlmAdapterOptions } from "./models.js";
import { addUsage, buildPageContent, toTokenUsage } from "./pages.js";

export interface VlmExtractorOptions extends VlmAdapterOptions {
  /** Documents up to this many pages go in one call (default: 10) */
  singlePassThreshold?: number;
  /** Pages per comprehension batch in multi-pass mode (default: 5) */
  batchSize?: number;
  logger?: Logger;
}

// ── Output schemas ──────────────────────────────────────────────────────────

function fieldValueSchema(field: CatalogField): z.ZodTypeAny {
  switch (field.fieldType) {
    case "number":
      return z.number().nullable();
    case "boolean":
      return z.boolean().nullable();
    case "list":
      return z.array(z.string()).nullable();
    case "table": {
      const columns = field.tableColumns ?? [];
      const row =
        columns.length > 0
          ? z.object(Object.fromEntries(columns.map((c) => [c.code, fieldValueSchema(c)])))
          : z.record(z.string(), z.string());
      return z.array(row).nullable();
    }
    default:
      return z.string().nullable();
  }
}

/** One value and one confidence per requested field; null when not found. */
export function buildExtractionSchema(fields: readonly CatalogField[]) {
  return z.object({
    fields: z.object(
      Object.fromEntries(fields.map((f) => [f.code, fieldValueSchema(f).describe(f.displayName)])),
    ),
    confidence: z.object(
      Object.fromEntries(fields.map((f) => [f.code, z.number().min(0).max(1)])),
    ),
    notes: z.string(),
  });
}

export const ComprehensionOutputSchema = z.object({
  findings: z.string().describe("Everything relevant found on these pages, with page numbers"),
});

// ── Prompts ─────────────────────────────────────────────────────────────────

export function describeField(field: CatalogField, indent = 0): string {
  const prefix = "  ".repeat(indent);
  const parts = [`${prefix}- ${field.code} (${field.fieldType}): ${field.displayName}`];

  if (field.description) parts.push(`${prefix}  Description: ${field.description}`);
  if (field.required) parts.push(`${prefix}  Required: yes`);
  if (field.locationHint) parts.push(`${prefix}  Location: ${field.locationHint}`);
  if (field.formatPattern) parts.push(`${prefix}  Format: ${field.formatPattern}`);
  if (field.allowedValues && field.allowedValues.length > 0) {
    parts.push(`${prefix}  Allowed values: ${field.allowedValues.join(", ")}`);
  }
  if (field.minValue !== undefined || field.maxValue !== undefined) {
    parts.push(`${prefix}  Range: ${field.minValue ?? "..."} to ${field.maxValue ?? "..."}`);
  }
  if (field.tableColumns && field.tableColumns.length > 0) {
    parts.push(`${prefix}  Table columns:`);
    for (const column of field.tableColumns) parts.push(describeField(column, indent + 2));
  }
  return parts.join("\n");
}

function describeFields(fields: readonly CatalogField[]): string {
  return fields.map((f) => describeField(f)).join("\n");
}

export function buildExtractionPrompt(fields: readonly CatalogField[], instructions = ""): string {
  let prompt =
    "Extract the following fields from the document page images provided.\n\n" +
    "Fields to extract:\n" +
    describeFields(fields) +
    "\n\nRules:\n" +
    "- Only extract information explicitly visible in the document\n" +
    "- If a field cannot be found, set its value to null\n" +
    "- Preserve exact values as they appear (don't reformat)\n" +
    "- For tables, extract all rows and columns as a list of objects\n" +
    "- For each field, provide a confidence score (0.0-1.0)\n" +
    "- Pay attention to field location hints when provided\n" +
    "- Look across ALL provided pages to find the requested fields";
  if (instructions) prompt += `\n\nDocument-specific instructions: ${instructions}`;
  return prompt;
}

function buildComprehensionPrompt(
  fields: readonly CatalogField[],
  batchIndex: number,
  pageRange: string,
): string {
  return (
    `You are reading batch ${batchIndex + 1} of a multi-page document (pages ${pageRange}).\n\n` +
    "Identify and report ANY information from these pages that is relevant to the following fields:\n\n" +
    describeFields(fields) +
    "\n\nInstructions:\n" +
    "- Report ALL relevant data you find, exactly as it appears\n" +
    "- Include page numbers where you found each piece of data\n" +
    "- If these pages contain none of the requested information, say 'No relevant fields found on these pages'\n" +
    "- For tables, extract all visible rows\n" +
    "- Include headers, titles and section names that help interpret the data"
  );
}

function buildSynthesisPrompt(fields: readonly CatalogField[], findings: string): string {
  return (
    "You have reviewed an entire multi-page document across multiple batches. " +
    "Below is the accumulated knowledge from ALL pages:\n\n" +
    findings +
    "\n\n---\n\n" +
    "Now produce the FINAL structured extraction for these fields:\n\n" +
    describeFields(fields) +
    "\n\nRules:\n" +
    "- Use the accumulated findings above as your primary source\n" +
    "- The first page image is provided for visual format reference\n" +
    "- If a field was not found in any batch, set its value to null\n" +
    "- Preserve exact values as they appeared in the document\n" +
    "- For tables, merge rows found across different batches\n" +
    "- For each field, provide a confidence score (0.0-1.0)"
  );
}

const EXTRACTOR_SYSTEM_PROMPT = [
  "You are an expert document data extraction agent.",
  "Extract structured information from document images according to the provided field definitions.",
  "Only extract information explicitly present in the document. If a field cannot be found, return null.",
  "Preserve exact values as they appear and provide a confidence score for each field.",
].join("\n");

const COMPREHENSION_SYSTEM_PROMPT = [
  "You are a document comprehension agent.",
  "Read document pages carefully and report all information relevant to the requested fields, with page numbers.",
  "If a page contains no relevant information, say so explicitly.",
].join("\n");

// ── Adapter ─────────────────────────────────────────────────────────────────

interface ExtractionCall {
  output: { fields: Record<string, unknown>; confidence: Record<string, number>; notes: string };
  usage: TokenUsage;
}

/** Drops fields the model reported as null so defaults can fill them. */
function compact(
  values: Record<string, unknown>,
  confidence: Record<string, number>,
): Pick<ExtractionResult, "fields" | "confidence"> {
  const fields: Record<string, unknown> = {};
  const kept: Record<string, number> = {};
  for (const [code, value] of Object.entries(values)) {
    if (value === null || value === undefined) continue;
    fields[code] = value;
    const score = confidence[code];
    if (score !== undefined) kept[code] = score;
  }
  return { fields, confidence: kept };
}

export class VlmExtractorAdapter implements ExtractorPort {
  private readonly singlePassThreshold: number;
  private readonly batchSize: number;
  private readonly logger: Logger;

  constructor(private readonly options: VlmExtractorOptions) {
    this.singlePassThreshold = options.singlePassThreshold ?? 10;
    this.batchSize = options.batchSize ?? 5;
    this.logger = options.logger ?? silentLogger;
  }

  async extract(request: ExtractionRequest): Promise<ExtractionResult> {
    if (request.pages.length <= this.singlePassThreshold) {
      return this.singlePass(request);
    }
    return this.multiPass(request);
  }

  private async singlePass(request: ExtractionRequest): Promise<ExtractionResult> {
    const prompt = buildExtractionPrompt(
      request.fields,
      request.documentType?.extractionInstructions,
    );
    let extraction: ExtractionCall;
    try {
      extraction = await this.runExtraction(prompt, request.pages, request.fields);
    } catch (error) {
      this.logger.error("extraction.single_pass.failed", { error: errorMessage(error) });
      return emptyExtractionResult({ strategy: "single_pass", error: errorMessage(error) });
    }
    const { output, usage } = extraction;
    return {
      ...compact(output.fields, output.confidence),
      metadata: {
        strategy: "single_pass",
        ...(output.notes ? { notes: output.notes } : {}),
      },
      model: this.options.modelName,
      usage,
    };
  }

  private async multiPass(request: ExtractionRequest): Promise<ExtractionResult> {
    const { pages, fields } = request;
    const batches: PageImage[][] = [];
    for (let i = 0; i < pages.length; i += this.batchSize) {
      batches.push(pages.slice(i, i + this.batchSize));
    }

    this.logger.info("extraction.multi_pass.start", {
      pages: pages.length,
      batches: batches.length,
      batchSize: this.batchSize,
    });

    let usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
    const findings: string[] = [];

    for (const [index, batch] of batches.entries()) {
      const first = batch[0];
      const last = batch[batch.length - 1];
      const pageRange = first && last ? `${first.pageNumber}-${last.pageNumber}` : "";
      try {
        const content = await buildPageContent(
          buildComprehensionPrompt(fields, index, pageRange),
          batch,
        );
        const result = await generateObject({
          ...callSettings(this.options),
          schema: ComprehensionOutputSchema,
          schemaName: "PageFindings",
          system: COMPREHENSION_SYSTEM_PROMPT,
          messages: [{ role: "user", content }],
        });
        usage = addUsage(usage, toTokenUsage(result.usage));
        findings.push(`[Pages ${pageRange}]\n${result.object.findings}`);
      } catch (error) {
        this.logger.warn("extraction.multi_pass.batch_failed", {
          batch: index + 1,
          pageRange,
          error: errorMessage(error),
        });
        findings.push(`[Pages ${pageRange}]\n(batch failed: ${errorMessage(error)})`);
      }
    }

    const batchMetadata = { batches: batches.length, pagesProcessed: pages.length };
    let synthesis: ExtractionCall;
    try {
      synthesis = await this.runExtraction(
        buildSynthesisPrompt(fields, findings.join("\n\n")),
        pages.slice(0, 1),
        fields,
      );
    } catch (error) {
      this.logger.error("extraction.multi_pass.synthesis_failed", { error: errorMessage(error) });
      return {
        ...emptyExtractionResult({
          strategy: "multi_pass",
          ...batchMetadata,
          error: errorMessage(error),
        }),
        model: this.options.modelName,
        usage,
      };
    }
    const { output, usage: synthesisUsage } = synthesis;

    return {
      ...compact(output.fields, output.confidence),
      metadata: {
        strategy: "multi_pass",
        ...batchMetadata,
        ...(output.notes ? { notes: output.notes } : {}),
      },
      model: this.options.modelName,
      usage: addUsage(usage, synthesisUsage),
    };
  }

  private async runExtraction(
    prompt: string,
    pages: readonly PageImage[],
    fields: readonly CatalogField[],
  ): Promise<ExtractionCall> {
    const content = await buildPageContent(prompt, pages);
    const result = await generateObject({
      ...callSettings(this.options),
      schema: buildExtractionSchema(fields),
      schemaName: "ExtractedFields",
      system: EXTRACTOR_SYSTEM_PROMPT,
      messages: [{ role: "user", content }],
    });
    return { output: result.object, usage: toTokenUsage(result.usage) };
  }
}
