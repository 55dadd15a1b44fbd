// =============================================================================
// FileSourcePort: Reads a file from one kind of source
// =============================================================================

import type { FileReference } from "../domain/common.schema.js";

export interface FileMetadata {
  filename: string;
  mimeType: string;
  fileSizeBytes: number;
  lastModified?: number;
}

export interface FileSourcePort {
  /** Registry key, e.g. "local" or "url" */
  readonly sourceType: string;

  /** Make the file readable locally and describe it */
  read(reference: string, filename?: string): Promise<FileReference>;

  exists(reference: string): Promise<boolean>;

  getMetadata(reference: string): Promise<FileMetadata>;
}
