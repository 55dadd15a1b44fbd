// =============================================================================
// ClassificationService: Candidate pool assembly around the classifier
// =============================================================================

import type { ClassifierPort } from "../ports/classifier.port.js";
import type { DocumentTypeCatalogPort } from "../ports/catalog.port.js";
import { DocumentNatureSchema, type PageImage } from "../domain/common.schema.js";
import type { DocumentType } from "../domain/catalog.schema.js";
import type { ClassificationResult } from "../domain/pipeline.schema.js";
import { synthesizeDocumentType } from "../domain/request.schema.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";

export interface ClassificationServiceOptions {
  classifier: ClassifierPort;
  documentTypes: DocumentTypeCatalogPort;
  /** Alternatives kept after the best match */
  maxCandidates: number;
  logger?: Logger;
}

export interface ClassifyOptions {
  expectedType?: string;
  /** Unknown nature names are ignored */
  expectedNature?: string;
  /** Request-scoped types, appended after the catalog's active types */
  adHocTypes?: readonly DocumentType[];
}

export function noClassification(reasoning: string): ClassificationResult {
  return { bestMatch: null, candidates: [], confidence: 0, reasoning, metadata: {} };
}

export class ClassificationService {
  private readonly classifier: ClassifierPort;
  private readonly documentTypes: DocumentTypeCatalogPort;
  private readonly maxCandidates: number;
  private readonly logger: Logger;

  constructor(options: ClassificationServiceOptions) {
    this.classifier = options.classifier;
    this.documentTypes = options.documentTypes;
    this.maxCandidates = options.maxCandidates;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Active catalog types, then ad-hoc types, narrowed by nature. When that
   * leaves nothing and an expected type is given, a synthesized type
   * stands in for it.
   */
  async buildPool(options: ClassifyOptions = {}): Promise<DocumentType[]> {
    let pool = [...(await this.documentTypes.findAllActive()), ...(options.adHocTypes ?? [])];

    const nature = DocumentNatureSchema.safeParse(options.expectedNature);
    if (nature.success) {
      pool = pool.filter((dt) => dt.nature === nature.data);
    } else if (options.expectedNature) {
      this.logger.warn("classification.unknown_nature", { nature: options.expectedNature });
    }

    if (pool.length === 0 && options.expectedType) {
      pool = [synthesizeDocumentType(options.expectedType)];
    }
    return pool;
  }

  /** Never throws for classifier failures; those yield a zero-confidence result. */
  async classify(pages: PageImage[], options: ClassifyOptions = {}): Promise<ClassificationResult> {
    const pool = await this.buildPool(options);
    if (pool.length === 0) return noClassification("No document types available");

    const nature = DocumentNatureSchema.safeParse(options.expectedNature);
    let result: ClassificationResult;
    try {
      result = await this.classifier.classify(pages, pool, {
        expectedType: options.expectedType,
        expectedNature: nature.success ? nature.data : undefined,
      });
    } catch (error) {
      this.logger.error("classification.failed", { error: errorMessage(error), pool: pool.length });
      return {
        ...noClassification(`Classification failed: ${errorMessage(error)}`),
        metadata: { error: errorMessage(error) },
      };
    }

    const limit = this.maxCandidates + (result.bestMatch ? 1 : 0);
    const capped: ClassificationResult = {
      ...result,
      candidates: result.candidates.slice(0, limit),
    };

    this.logger.info("classification.completed", {
      documentTypeCode: capped.bestMatch?.documentTypeCode ?? "unknown",
      confidence: capped.confidence,
      poolSize: pool.length,
    });
    return capped;
  }
}
