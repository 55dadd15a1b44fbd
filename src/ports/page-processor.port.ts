// =============================================================================
// PreProcessorPort: Page rasterization and image clean-up
// =============================================================================

import type { FileReference, PageImage } from "../domain/common.schema.js";

export interface PageConversionOptions {
  dpi: number;
  outputDir: string;
}

export interface PreProcessorPort {
  convertToImages(file: FileReference, options: PageConversionOptions): Promise<PageImage[]>;

  /** Clockwise skew in degrees; 0 when upright */
  detectRotation(page: PageImage): Promise<number>;

  correctRotation(page: PageImage, angle: number): Promise<PageImage>;

  enhance(page: PageImage, options: { denoise: boolean }): Promise<PageImage>;

  /** Quality in [0, 1] */
  assessQuality(page: PageImage): Promise<number>;
}
