// =============================================================================
// ExtractionService: Extractor delegation and default-value backfill
// =============================================================================

import type { ExtractorPort } from "../ports/extractor.port.js";
import type { PageImage } from "../domain/common.schema.js";
import type { CatalogField, DocumentType } from "../domain/catalog.schema.js";
import type { ExtractionResult } from "../domain/pipeline.schema.js";
import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";

export interface ExtractionServiceOptions {
  extractor: ExtractorPort;
  logger?: Logger;
}

/**
 * Fill every field that has a default and no extracted value. Returns a new
 * result; applying it twice gives the same result as applying it once.
 */
export function applyDefaultValues(
  result: ExtractionResult,
  fields: readonly CatalogField[],
): ExtractionResult {
  const values = { ...result.fields };
  const confidence = { ...result.confidence };
  const applied: string[] = [];

  for (const field of fields) {
    if (field.defaultValue === undefined || field.defaultValue === null) continue;
    if (Object.hasOwn(values, field.code)) continue;
    values[field.code] = field.defaultValue;
    confidence[field.code] = 1;
    applied.push(field.code);
  }

  if (applied.length === 0) return { ...result, fields: values, confidence };

  const previous = result.metadata.defaultsApplied;
  const alreadyApplied = Array.isArray(previous)
    ? previous.filter((code): code is string => typeof code === "string")
    : [];
  return {
    ...result,
    fields: values,
    confidence,
    metadata: { ...result.metadata, defaultsApplied: [...alreadyApplied, ...applied] },
  };
}

export class ExtractionService {
  private readonly extractor: ExtractorPort;
  private readonly logger: Logger;

  constructor(options: ExtractionServiceOptions) {
    this.extractor = options.extractor;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Errors thrown by the extractor propagate and fail the document. An
   * extractor that degrades to an empty result still gets its defaults.
   */
  async extract(
    pages: PageImage[],
    fields: CatalogField[],
    documentType?: DocumentType,
  ): Promise<ExtractionResult> {
    this.logger.debug("extraction.start", { fields: fields.length, pages: pages.length });
    const result = await this.extractor.extract({ pages, fields, documentType });

    const filled = applyDefaultValues(result, fields);
    this.logger.info("extraction.completed", {
      fieldsRequested: fields.length,
      fieldsExtracted: Object.keys(filled.fields).length,
      ...(typeof filled.metadata.error === "string" ? { error: filled.metadata.error } : {}),
    });
    return filled;
  }
}
