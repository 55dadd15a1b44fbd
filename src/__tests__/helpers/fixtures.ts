// =============================================================================
// Test fixtures: Builders and in-process fakes for pipeline tests
// =============================================================================

import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { FileMetadata, FileSourcePort } from "../../ports/file-source.port.js";
import type { PageConversionOptions, PreProcessorPort } from "../../ports/page-processor.port.js";
import type { DocumentSplitterPort } from "../../ports/splitter.port.js";
import type { FileReference, PageImage } from "../../domain/common.schema.js";
import {
  CatalogFieldSchema,
  DocumentTypeSchema,
  ValidatorDefinitionSchema,
  type CatalogField,
  type CatalogFieldInput,
  type DocumentType,
  type DocumentTypeInput,
  type ValidatorDefinition,
  type ValidatorDefinitionInput,
} from "../../domain/catalog.schema.js";
import type { SplittingResult } from "../../domain/pipeline.schema.js";
import { FileSourceError } from "../../errors.js";
import { createLogger, type LogEntry, type Logger } from "../../logging.js";
import { createProcessingEngine, type ProcessingEngine, type ProcessingEngineOptions } from "../../engine.js";
import {
  InMemoryDocumentTypeCatalog,
  InMemoryFieldCatalog,
  InMemoryValidatorCatalog,
} from "../../adapters/catalog/inmemory-catalog.adapter.js";
import { CatalogService } from "../../services/catalog.service.js";

// ── Builders ────────────────────────────────────────────────────────────────

export function makePage(pageNumber: number, overrides: Partial<PageImage> = {}): PageImage {
  return {
    pageNumber,
    imagePath: `/tmp/pages/page-${pageNumber}.png`,
    width: 1240,
    height: 1754,
    dpi: 150,
    rotationApplied: 0,
    enhancementsApplied: [],
    qualityScore: 1,
    ...overrides,
  };
}

export function makePages(count: number): PageImage[] {
  return Array.from({ length: count }, (_, i) => makePage(i + 1));
}

export function makeField(input: CatalogFieldInput): CatalogField {
  return CatalogFieldSchema.parse(input);
}

export function makeDocumentType(input: DocumentTypeInput): DocumentType {
  return DocumentTypeSchema.parse(input);
}

export function makeValidator(input: ValidatorDefinitionInput): ValidatorDefinition {
  return ValidatorDefinitionSchema.parse(input);
}

/** PNG signature bytes; enough for code that reads the file but never decodes it. */
export const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47]);

/** Writes `count` page images into a fresh temp directory. */
export async function writePageImages(count: number): Promise<{ dir: string; pages: PageImage[] }> {
  const dir = await mkdtemp(join(tmpdir(), "pagewise-pages-"));
  const pages: PageImage[] = [];
  for (let n = 1; n <= count; n++) {
    const imagePath = join(dir, `page-${n}.png`);
    await writeFile(imagePath, PNG_BYTES);
    pages.push(makePage(n, { imagePath }));
  }
  return { dir, pages };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Logger that keeps every entry, debug included. */
export function recordingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { logger: createLogger({ sink: (e) => entries.push(e), minLevel: "debug" }), entries };
}

export interface TestCatalog {
  catalog: CatalogService;
  documentTypes: InMemoryDocumentTypeCatalog;
  fields: InMemoryFieldCatalog;
  validators: InMemoryValidatorCatalog;
}

export function inMemoryCatalog(logger?: Logger): TestCatalog {
  const documentTypes = new InMemoryDocumentTypeCatalog();
  const fields = new InMemoryFieldCatalog();
  const validators = new InMemoryValidatorCatalog();
  return {
    catalog: new CatalogService({ documentTypes, fields, validators, logger }),
    documentTypes,
    fields,
    validators,
  };
}

// ── Fakes ───────────────────────────────────────────────────────────────────

export interface MemoryFile {
  mimeType: string;
  fileSizeBytes: number;
}

/** Source "memory": files registered up front, nothing touches disk. */
export class MemoryFileSource implements FileSourcePort {
  readonly sourceType = "memory";
  private readonly files = new Map<string, MemoryFile>();

  add(reference: string, file: MemoryFile): this {
    this.files.set(reference, file);
    return this;
  }

  async read(reference: string, filename?: string): Promise<FileReference> {
    const file = this.files.get(reference);
    if (!file) throw new FileSourceError(this.sourceType, reference, "File not found");
    return {
      sourceType: this.sourceType,
      sourceReference: reference,
      filename: filename ?? reference,
      mimeType: file.mimeType,
      fileSizeBytes: file.fileSizeBytes,
      contentPath: `/memory/${reference}`,
      metadata: {},
    };
  }

  async exists(reference: string): Promise<boolean> {
    return this.files.has(reference);
  }

  async getMetadata(reference: string): Promise<FileMetadata> {
    const file = this.files.get(reference);
    if (!file) throw new FileSourceError(this.sourceType, reference, "File not found");
    return { filename: reference, mimeType: file.mimeType, fileSizeBytes: file.fileSizeBytes };
  }
}

/** Produces `pageCount` pages of the given quality for any file. */
export class FakePageProcessor implements PreProcessorPort {
  constructor(
    private readonly pageCount: number,
    private readonly options: { quality?: number; rotation?: number } = {},
  ) {}

  async convertToImages(_file: FileReference, options: PageConversionOptions): Promise<PageImage[]> {
    return makePages(this.pageCount).map((p) => ({
      ...p,
      dpi: options.dpi,
      qualityScore: this.options.quality ?? 1,
    }));
  }

  async detectRotation(): Promise<number> {
    return this.options.rotation ?? 0;
  }

  async correctRotation(page: PageImage, angle: number): Promise<PageImage> {
    return { ...page, rotationApplied: angle };
  }

  async enhance(page: PageImage): Promise<PageImage> {
    return page;
  }

  async assessQuality(page: PageImage): Promise<number> {
    return page.qualityScore;
  }
}

/** Strategy "fixed": returns the given inclusive page ranges. */
export class FixedSplitter implements DocumentSplitterPort {
  readonly strategyName = "fixed";

  constructor(private readonly ranges: ReadonlyArray<readonly [number, number]>) {}

  async detectBoundaries(): Promise<SplittingResult> {
    return {
      boundaries: this.ranges.map(([startPage, endPage]) => ({
        startPage,
        endPage,
        confidence: 1,
        reasoning: "fixed",
        detectedTypeHint: "",
      })),
      strategy: this.strategyName,
      confidence: 1,
    };
  }
}

// ── Engine ──────────────────────────────────────────────────────────────────

export const SOURCE_REF = "batch.png";

/**
 * Engine over a memory source holding {@link SOURCE_REF}, a fake page
 * processor and the fixed splitter. Models resolve to the model string itself,
 * so nothing reaches a provider.
 */
export function testEngine(
  options: ProcessingEngineOptions & { pages?: number; ranges?: ReadonlyArray<readonly [number, number]> } = {},
): ProcessingEngine {
  const { pages = 1, ranges = [[1, 1]], ...rest } = options;
  return createProcessingEngine({
    env: {},
    logger: createLogger({ sink: () => undefined }),
    resolveModel: (spec) => spec,
    sources: [new MemoryFileSource().add(SOURCE_REF, { mimeType: "image/png", fileSizeBytes: 2048 })],
    preprocessor: new FakePageProcessor(pages),
    splitters: [new FixedSplitter(ranges)],
    ...rest,
    config: { defaultSplittingStrategy: "fixed", ...rest.config },
  });
}
