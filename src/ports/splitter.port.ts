// =============================================================================
// DocumentSplitterPort: Boundary detection strategy
// =============================================================================

import type { PageImage } from "../domain/common.schema.js";
import type { SplittingResult } from "../domain/pipeline.schema.js";

export interface DocumentSplitterPort {
  /** Registry key, e.g. "page_based" */
  readonly strategyName: string;

  detectBoundaries(pages: PageImage[]): Promise<SplittingResult>;
}
