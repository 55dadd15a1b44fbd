// =============================================================================
// ExtractorPort: Pulls structured field values from pages
// =============================================================================

import type { PageImage } from "../domain/common.schema.js";
import type { CatalogField, DocumentType } from "../domain/catalog.schema.js";
import type { ExtractionResult } from "../domain/pipeline.schema.js";

export interface ExtractionRequest {
  pages: PageImage[];
  fields: CatalogField[];
  documentType?: DocumentType;
}

export interface ExtractorPort {
  extract(request: ExtractionRequest): Promise<ExtractionResult>;
}
