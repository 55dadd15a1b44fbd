// =============================================================================
// DefaultCostEstimatorAdapter: Token usage priced per model
// =============================================================================

import type { CostEstimatorPort } from "../../ports/cost-estimator.port.js";
import type { TokenUsage } from "../../domain/common.schema.js";
import type { Logger } from "../../logging.js";
import { silentLogger } from "../../logging.js";
import { parseModelSpec } from "../vlm/models.js";

// Pricing per 1M tokens: [input, output]
export const MODEL_PRICING: Record<string, [number, number]> = {
  // OpenAI
  "gpt-4o":                    [2.50, 10.00],
  "gpt-4o-mini":               [0.15, 0.60],
  "gpt-4.1":                   [2.00, 8.00],
  "gpt-4.1-mini":              [0.40, 1.60],
  "gpt-4-turbo":               [10.00, 30.00],
  // Anthropic
  "claude-sonnet-4-20250514":  [3.00, 15.00],
  "claude-opus-4-20250514":    [15.00, 75.00],
  "claude-3-5-haiku-latest":   [0.80, 4.00],
  "claude-3-haiku":            [0.25, 1.25],
};

export interface CostEstimatorOptions {
  /** Extra or overriding prices, keyed by model id */
  pricing?: Record<string, [number, number]>;
  logger?: Logger;
}

export class DefaultCostEstimatorAdapter implements CostEstimatorPort {
  private readonly pricing: Record<string, [number, number]>;
  private readonly logger: Logger;

  /** Models seen that have no pricing data. */
  readonly unpricedModels = new Set<string>();

  constructor(options: CostEstimatorOptions = {}) {
    this.pricing = { ...MODEL_PRICING, ...options.pricing };
    this.logger = options.logger ?? silentLogger;
  }

  /** Accepts a bare model id or a "provider:model" spec. */
  estimate(model: string, usage: TokenUsage): number {
    const { modelId } = parseModelSpec(model);
    const price = Object.hasOwn(this.pricing, modelId) ? this.pricing[modelId] : undefined;
    if (!price) {
      if (!this.unpricedModels.has(modelId)) {
        this.logger.warn("cost.unpriced_model", { model: modelId });
        this.unpricedModels.add(modelId);
      }
      return 0;
    }

    // Clamp non-finite / negative token counts to 0
    const input = Number.isFinite(usage.inputTokens) && usage.inputTokens > 0 ? usage.inputTokens : 0;
    const output = Number.isFinite(usage.outputTokens) && usage.outputTokens > 0 ? usage.outputTokens : 0;
    const [inputPrice, outputPrice] = price;
    return (input / 1_000_000) * inputPrice + (output / 1_000_000) * outputPrice;
  }
}
