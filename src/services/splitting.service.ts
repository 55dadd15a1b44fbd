// =============================================================================
// SplittingService: Strategy registry for boundary detection
// =============================================================================

import type { DocumentSplitterPort } from "../ports/splitter.port.js";
import type { PageImage } from "../domain/common.schema.js";
import type { SplittingResult } from "../domain/pipeline.schema.js";
import { ConfigurationError, SplittingError } from "../errors.js";
import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";

export interface SplittingServiceOptions {
  strategies: readonly DocumentSplitterPort[];
  defaultStrategy: string;
  logger?: Logger;
}

export class SplittingService {
  private readonly strategies = new Map<string, DocumentSplitterPort>();
  private readonly defaultStrategy: string;
  private readonly logger: Logger;

  constructor(options: SplittingServiceOptions) {
    for (const strategy of options.strategies) {
      if (this.strategies.has(strategy.strategyName)) {
        throw new ConfigurationError(`Duplicate splitting strategy: ${strategy.strategyName}`, {
          strategy: strategy.strategyName,
        });
      }
      this.strategies.set(strategy.strategyName, strategy);
    }
    this.defaultStrategy = options.defaultStrategy;
    this.logger = options.logger ?? silentLogger;
  }

  availableStrategies(): string[] {
    return Array.from(this.strategies.keys());
  }

  /** Uses `strategy` when given, else the configured default. */
  async split(pages: PageImage[], strategy?: string): Promise<SplittingResult> {
    const name = strategy ?? this.defaultStrategy;
    const splitter = this.strategies.get(name);
    if (!splitter) {
      const available = this.availableStrategies();
      throw new SplittingError(
        `Unknown splitting strategy '${name}'. Available: ${available.join(", ")}`,
        "SPLITTING_UNKNOWN_STRATEGY",
        { context: { strategy: name, available } },
      );
    }

    const result = await splitter.detectBoundaries(pages);
    this.logger.info("splitting.completed", {
      strategy: name,
      documents: result.boundaries.length,
      confidence: result.confidence,
    });
    return result;
  }
}
