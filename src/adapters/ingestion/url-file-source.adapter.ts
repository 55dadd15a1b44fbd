// =============================================================================
// UrlFileSourceAdapter: Downloads HTTP(S) files into a temp directory
// =============================================================================

import { randomUUID } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import { extname, join } from "node:path";
import type { FileMetadata, FileSourcePort } from "../../ports/file-source.port.js";
import type { FileReference } from "../../domain/common.schema.js";
import { FileSourceError, errorMessage } from "../../errors.js";

export interface UrlFileSourceOptions {
  /** Directory downloads are written to */
  tempDir: string;
  /** Per-request timeout (default: 60s) */
  timeoutMs?: number;
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
}

const FALLBACK_MIME_TYPE = "application/octet-stream";

/** Percent-decoded text, or the raw text when an escape is malformed. */
function decodeSegment(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** Content-Disposition filename, else the last URL path segment when it has an extension. */
export function filenameFromResponse(url: string, headers: Headers): string {
  const disposition = headers.get("content-disposition") ?? "";
  const match = /filename\*?=(?:UTF-8'')?["']?([^"';]+)["']?/i.exec(disposition);
  if (match?.[1]) return decodeSegment(match[1].trim());

  let pathname = "";
  try {
    pathname = new URL(url).pathname;
  } catch {
    return "download";
  }
  const last = decodeSegment(pathname.split("/").pop() ?? "");
  return last.includes(".") ? last : "download";
}

function contentType(headers: Headers): string {
  const raw = headers.get("content-type");
  if (!raw) return FALLBACK_MIME_TYPE;
  return raw.split(";")[0]?.trim() || FALLBACK_MIME_TYPE;
}

export class UrlFileSourceAdapter implements FileSourcePort {
  readonly sourceType = "url";

  private readonly tempDir: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;

  constructor(options: UrlFileSourceOptions) {
    this.tempDir = options.tempDir;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.headers = options.headers ?? {};
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async read(reference: string, filename?: string): Promise<FileReference> {
    const { headers, body } = await this.request(reference, "GET", async (response) => ({
      headers: response.headers,
      body: new Uint8Array(await response.arrayBuffer()),
    }));

    const name = filename ?? filenameFromResponse(reference, headers);
    await mkdir(this.tempDir, { recursive: true });
    const contentPath = join(this.tempDir, `${randomUUID()}${extname(name)}`);
    await writeFile(contentPath, body);

    return {
      sourceType: this.sourceType,
      sourceReference: reference,
      filename: name,
      mimeType: contentType(headers),
      fileSizeBytes: body.byteLength,
      contentPath,
      metadata: {},
    };
  }

  async exists(reference: string): Promise<boolean> {
    try {
      await this.request(reference, "HEAD", async () => undefined);
      return true;
    } catch {
      return false;
    }
  }

  async getMetadata(reference: string): Promise<FileMetadata> {
    const headers = await this.request(reference, "HEAD", async (response) => response.headers);
    return {
      filename: filenameFromResponse(reference, headers),
      mimeType: contentType(headers),
      fileSizeBytes: Number(headers.get("content-length") ?? 0),
    };
  }

  /** The timeout covers `consume`, so a stalled body read is aborted too. */
  private async request<T>(
    reference: string,
    method: "GET" | "HEAD",
    consume: (response: Response) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(reference, {
        method,
        headers: this.headers,
        redirect: "follow",
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new FileSourceError(this.sourceType, reference, `HTTP ${response.status}`);
      }
      return await consume(response);
    } catch (error) {
      if (error instanceof FileSourceError) throw error;
      const reason = controller.signal.aborted ? `timed out after ${this.timeoutMs} ms` : errorMessage(error);
      throw new FileSourceError(this.sourceType, reference, reason, error);
    } finally {
      clearTimeout(timer);
    }
  }
}
