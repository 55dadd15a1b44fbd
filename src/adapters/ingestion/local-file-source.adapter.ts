// =============================================================================
// LocalFileSourceAdapter: Files on the local filesystem
// =============================================================================

import { stat } from "node:fs/promises";
import { basename } from "node:path";
import { lookup } from "mime-types";
import type { FileMetadata, FileSourcePort } from "../../ports/file-source.port.js";
import type { FileReference } from "../../domain/common.schema.js";
import { FileSourceError } from "../../errors.js";

const FALLBACK_MIME_TYPE = "application/octet-stream";

export function guessMimeType(filename: string): string {
  return lookup(filename) || FALLBACK_MIME_TYPE;
}

export class LocalFileSourceAdapter implements FileSourcePort {
  readonly sourceType = "local";

  async read(reference: string, filename?: string): Promise<FileReference> {
    const info = await this.statFile(reference);
    if (!info.isFile()) {
      throw new FileSourceError(this.sourceType, reference, "Not a file");
    }

    const name = filename ?? basename(reference);
    return {
      sourceType: this.sourceType,
      sourceReference: reference,
      filename: name,
      mimeType: guessMimeType(basename(reference)),
      fileSizeBytes: info.size,
      contentPath: reference,
      metadata: {},
    };
  }

  async exists(reference: string): Promise<boolean> {
    try {
      return (await stat(reference)).isFile();
    } catch {
      return false;
    }
  }

  async getMetadata(reference: string): Promise<FileMetadata> {
    const info = await this.statFile(reference);
    return {
      filename: basename(reference),
      mimeType: guessMimeType(basename(reference)),
      fileSizeBytes: info.size,
      lastModified: info.mtimeMs,
    };
  }

  private async statFile(reference: string) {
    try {
      return await stat(reference);
    } catch (error) {
      throw new FileSourceError(this.sourceType, reference, "File not found", error);
    }
  }
}
