// =============================================================================
// FieldResolver: Which fields to extract for the current document
// =============================================================================

import type { CatalogField, DocumentType } from "../domain/catalog.schema.js";
import type { ClassificationResult } from "../domain/pipeline.schema.js";
import {
  inlineFieldToCatalogField,
  type InlineFieldDefinition,
} from "../domain/request.schema.js";
import { DocumentTypeNotFoundError } from "../errors.js";
import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";
import type { CatalogService } from "../services/catalog.service.js";

export type FieldSource = "inline" | "target_codes" | "catalog_defaults" | "none";

export interface FieldResolution {
  source: FieldSource;
  fields: CatalogField[];
}

export interface FieldResolutionInput {
  inlineFields: readonly InlineFieldDefinition[];
  targetFieldCodes: readonly string[];
  classification?: ClassificationResult;
}

export interface FieldResolverOptions {
  catalog: CatalogService;
  /** Used when the matched type sets no threshold of its own */
  defaultConfidenceThreshold: number;
  logger?: Logger;
}

/** The type's own threshold when it has one, else the global default. */
export function effectiveThreshold(
  documentType: Pick<DocumentType, "classificationConfidenceThreshold">,
  defaultThreshold: number,
): number {
  return documentType.classificationConfidenceThreshold ?? defaultThreshold;
}

/**
 * First source that applies wins:
 *
 * 1. inline field definitions from the request, used verbatim
 * 2. catalog field codes from the request; an unknown code throws
 *    `TargetSchemaResolutionError`
 * 3. default fields of the classified catalog type, when the match is
 *    confident enough
 *
 * Below the threshold, or for a type that is not in the catalog, the
 * result is empty and nothing is thrown.
 */
export class FieldResolver {
  private readonly catalog: CatalogService;
  private readonly defaultThreshold: number;
  private readonly logger: Logger;

  constructor(options: FieldResolverOptions) {
    this.catalog = options.catalog;
    this.defaultThreshold = options.defaultConfidenceThreshold;
    this.logger = options.logger ?? silentLogger;
  }

  async resolve(input: FieldResolutionInput): Promise<FieldResolution> {
    if (input.inlineFields.length > 0) {
      return { source: "inline", fields: input.inlineFields.map(inlineFieldToCatalogField) };
    }

    if (input.targetFieldCodes.length > 0) {
      return {
        source: "target_codes",
        fields: await this.catalog.resolveFields(input.targetFieldCodes),
      };
    }

    const match = input.classification?.bestMatch;
    if (!match) return { source: "none", fields: [] };

    let documentType: DocumentType;
    try {
      documentType = await this.catalog.getDocumentType(match.documentTypeId);
    } catch (error) {
      if (error instanceof DocumentTypeNotFoundError) {
        // Ad-hoc and synthesized types carry no catalog defaults
        return { source: "none", fields: [] };
      }
      throw error;
    }

    const threshold = effectiveThreshold(documentType, this.defaultThreshold);
    if (match.confidence < threshold) {
      this.logger.info("fields.below_threshold", {
        documentTypeCode: documentType.code,
        confidence: match.confidence,
        threshold,
      });
      return { source: "none", fields: [] };
    }

    return {
      source: "catalog_defaults",
      fields: await this.catalog.getDefaultFields(documentType.id),
    };
  }
}
