// =============================================================================
// PipelineStep: One stage of the processing pipeline
// =============================================================================

import type { PipelineContext } from "../context.js";

/**
 * A stage reads what upstream stages left on the context and writes only
 * the field it owns.
 */
export interface PipelineStep {
  readonly name: string;
  execute(ctx: PipelineContext): Promise<void>;
}
