// =============================================================================
// CostEstimatorPort: Token usage to USD
// =============================================================================

import type { TokenUsage } from "../domain/common.schema.js";

export interface CostEstimatorPort {
  estimate(model: string, usage: TokenUsage): number;
}
