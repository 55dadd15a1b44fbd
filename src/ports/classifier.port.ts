// =============================================================================
// ClassifierPort: Matches pages against candidate document types
// =============================================================================

import type { DocumentNature, PageImage } from "../domain/common.schema.js";
import type { DocumentType } from "../domain/catalog.schema.js";
import type { ClassificationResult } from "../domain/pipeline.schema.js";

export interface ClassificationHints {
  expectedType?: string;
  expectedNature?: DocumentNature;
}

export interface ClassifierPort {
  classify(
    pages: PageImage[],
    candidates: DocumentType[],
    hints?: ClassificationHints,
  ): Promise<ClassificationResult>;
}
