// =============================================================================
// IngestionService: Source registry plus MIME and size limits
// =============================================================================

import type { FileMetadata, FileSourcePort } from "../ports/file-source.port.js";
import type { FileReference } from "../domain/common.schema.js";
import type { PagewiseConfig } from "../config.js";
import {
  ConfigurationError,
  FileSourceError,
  FileTooLargeError,
  UnsupportedFileTypeError,
} from "../errors.js";
import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";

const BYTES_PER_MB = 1024 * 1024;

export interface IngestionServiceOptions {
  sources: readonly FileSourcePort[];
  config: Pick<PagewiseConfig, "supportedMimeTypes" | "maxFileSizeMb">;
  logger?: Logger;
}

export class IngestionService {
  private readonly sources = new Map<string, FileSourcePort>();
  private readonly config: IngestionServiceOptions["config"];
  private readonly logger: Logger;

  constructor(options: IngestionServiceOptions) {
    for (const source of options.sources) {
      if (this.sources.has(source.sourceType)) {
        throw new ConfigurationError(`Duplicate file source: ${source.sourceType}`, {
          sourceType: source.sourceType,
        });
      }
      this.sources.set(source.sourceType, source);
    }
    this.config = options.config;
    this.logger = options.logger ?? silentLogger;
  }

  availableSources(): string[] {
    return Array.from(this.sources.keys());
  }

  /**
   * Read the file through its source, then enforce the MIME allow-list and
   * the size limit.
   */
  async ingest(sourceType: string, reference: string, filename?: string): Promise<FileReference> {
    const source = this.sourceFor(sourceType, reference);
    const file = await source.read(reference, filename);

    if (!this.config.supportedMimeTypes.includes(file.mimeType)) {
      throw new UnsupportedFileTypeError(file.mimeType, this.config.supportedMimeTypes);
    }

    const sizeMb = file.fileSizeBytes / BYTES_PER_MB;
    if (sizeMb > this.config.maxFileSizeMb) {
      throw new FileTooLargeError(sizeMb, this.config.maxFileSizeMb);
    }

    this.logger.info("ingestion.completed", {
      sourceType,
      filename: file.filename,
      mimeType: file.mimeType,
      fileSizeBytes: file.fileSizeBytes,
    });
    return file;
  }

  checkExists(sourceType: string, reference: string): Promise<boolean> {
    return this.sourceFor(sourceType, reference).exists(reference);
  }

  getMetadata(sourceType: string, reference: string): Promise<FileMetadata> {
    return this.sourceFor(sourceType, reference).getMetadata(reference);
  }

  private sourceFor(sourceType: string, reference: string): FileSourcePort {
    const source = this.sources.get(sourceType);
    if (!source) {
      throw new FileSourceError(
        sourceType,
        reference,
        `No adapter registered for source type '${sourceType}'. Available: ${this.availableSources().join(", ")}`,
      );
    }
    return source;
  }
}
