// =============================================================================
// PreProcessingService: Page conversion, rotation, enhancement, quality gate
// =============================================================================

import type { PreProcessorPort } from "../ports/page-processor.port.js";
import type { FileReference, PageImage } from "../domain/common.schema.js";
import type { PreProcessingResult } from "../domain/pipeline.schema.js";
import type { PagewiseConfig } from "../config.js";
import { PageExtractionError, QualityTooLowError } from "../errors.js";
import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";

export type PreProcessingConfig = Pick<
  PagewiseConfig,
  | "defaultDpi"
  | "maxPagesPerFile"
  | "autoRotate"
  | "autoEnhance"
  | "autoDenoise"
  | "qualityThreshold"
  | "tempDir"
>;

export interface PreProcessingServiceOptions {
  processor: PreProcessorPort;
  config: PreProcessingConfig;
  logger?: Logger;
}

export class PreProcessingService {
  private readonly processor: PreProcessorPort;
  private readonly config: PreProcessingConfig;
  private readonly logger: Logger;

  constructor(options: PreProcessingServiceOptions) {
    this.processor = options.processor;
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
  }

  async preprocess(file: FileReference): Promise<PreProcessingResult> {
    const started = Date.now();
    const converted = await this.processor.convertToImages(file, {
      dpi: this.config.defaultDpi,
      outputDir: this.config.tempDir,
    });

    if (converted.length === 0) {
      throw new PageExtractionError("document has no pages", { filename: file.filename });
    }
    if (converted.length > this.config.maxPagesPerFile) {
      throw new PageExtractionError(
        `${converted.length} pages exceeds the limit of ${this.config.maxPagesPerFile}`,
        { filename: file.filename, pages: converted.length, maxPages: this.config.maxPagesPerFile },
      );
    }

    const pages: PageImage[] = [];
    let maxRotation = 0;
    for (const original of converted) {
      let page = original;

      if (this.config.autoRotate) {
        const angle = await this.processor.detectRotation(page);
        if (angle !== 0) {
          page = await this.processor.correctRotation(page, angle);
          maxRotation = Math.max(maxRotation, Math.abs(angle));
        }
      }

      if (this.config.autoEnhance) {
        page = await this.processor.enhance(page, { denoise: this.config.autoDenoise });
        page = { ...page, enhancementsApplied: [...page.enhancementsApplied, "auto_enhance"] };
      }

      page = { ...page, qualityScore: await this.processor.assessQuality(page) };
      pages.push(page);
    }

    const overallQuality = pages.reduce((sum, p) => sum + p.qualityScore, 0) / pages.length;
    if (overallQuality < this.config.qualityThreshold) {
      throw new QualityTooLowError(overallQuality, this.config.qualityThreshold);
    }

    const result: PreProcessingResult = {
      pages,
      totalPages: pages.length,
      overallQuality,
      processingTimeMs: Date.now() - started,
      metadata: { mimeType: file.mimeType, rotationDetected: maxRotation },
    };
    this.logger.info("preprocessing.completed", {
      totalPages: result.totalPages,
      overallQuality,
    });
    return result;
  }
}
