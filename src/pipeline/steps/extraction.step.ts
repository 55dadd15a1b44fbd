// =============================================================================
// ExtractionStep: Writes the current document's extraction
// =============================================================================

import type { PipelineContext } from "../context.js";
import type { DocumentTypeCatalogPort } from "../../ports/catalog.port.js";
import type { DocumentType } from "../../domain/catalog.schema.js";
import type { ExtractionService } from "../../services/extraction.service.js";
import type { PipelineStep } from "./step.js";

export class ExtractionStep implements PipelineStep {
  readonly name = "extract";

  constructor(
    private readonly extraction: ExtractionService,
    private readonly documentTypes: DocumentTypeCatalogPort,
  ) {}

  async execute(ctx: PipelineContext): Promise<void> {
    const doc = ctx.document;
    if (doc.resolvedFields.length === 0) return;
    doc.extraction = await this.extraction.extract(
      doc.pages,
      doc.resolvedFields,
      await this.matchedType(ctx),
    );
  }

  /** The classified type, from the request's ad-hoc types or the catalog. */
  private async matchedType(ctx: PipelineContext): Promise<DocumentType | undefined> {
    const match = ctx.document.classification?.bestMatch;
    if (!match) return undefined;
    const adHoc = ctx.adHocDocumentTypes.find((dt) => dt.id === match.documentTypeId);
    if (adHoc) return adHoc;
    return (await this.documentTypes.findById(match.documentTypeId)) ?? undefined;
  }
}
