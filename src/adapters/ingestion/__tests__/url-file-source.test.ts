import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FileSourceError } from "../../../errors.js";
import { UrlFileSourceAdapter, filenameFromResponse } from "../url-file-source.adapter.js";

describe("filenameFromResponse", () => {
  it("prefers the Content-Disposition filename", () => {
    const headers = new Headers({ "content-disposition": 'attachment; filename="scan 1.png"' });
    expect(filenameFromResponse("https://files.test/x", headers)).toBe("scan 1.png");
  });

  it("decodes an encoded filename", () => {
    const headers = new Headers({ "content-disposition": "attachment; filename*=UTF-8''r%C3%A9sum%C3%A9.pdf" });
    expect(filenameFromResponse("https://files.test/x", headers)).toBe("résumé.pdf");
  });

  it("keeps a malformed escape as written", () => {
    const headers = new Headers({ "content-disposition": "attachment; filename*=UTF-8''bad%E0%A4.pdf" });
    expect(filenameFromResponse("https://files.test/x", headers)).toBe("bad%E0%A4.pdf");
  });

  it("falls back to the last path segment, then to download", () => {
    const none = new Headers();
    expect(filenameFromResponse("https://files.test/docs/invoice%20march.pdf", none)).toBe("invoice march.pdf");
    expect(filenameFromResponse("https://files.test/docs/latest", none)).toBe("download");
    expect(filenameFromResponse("not a url", none)).toBe("download");
  });
});

describe("UrlFileSourceAdapter", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "pagewise-url-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("downloads into the temp directory", async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      async () =>
        new Response("abc", {
          headers: {
            "content-type": "image/png; charset=binary",
            "content-disposition": 'attachment; filename="scan.png"',
          },
        }),
    );
    const source = new UrlFileSourceAdapter({ tempDir, fetchImpl, headers: { authorization: "Bearer test-token" } });

    const file = await source.read("https://files.test/get?id=7");

    expect(file).toMatchObject({
      sourceType: "url",
      sourceReference: "https://files.test/get?id=7",
      filename: "scan.png",
      mimeType: "image/png",
      fileSizeBytes: 3,
    });
    expect(file.contentPath?.startsWith(tempDir)).toBe(true);
    expect(file.contentPath?.endsWith(".png")).toBe(true);
    expect(await readFile(file.contentPath ?? "", "utf8")).toBe("abc");
    expect(fetchImpl.mock.calls[0]?.[1]).toMatchObject({
      method: "GET",
      headers: { authorization: "Bearer test-token" },
      redirect: "follow",
    });
  });

  it("turns HTTP errors into file source errors", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("gone", { status: 404 }));
    const source = new UrlFileSourceAdapter({ tempDir, fetchImpl });

    await expect(source.read("https://files.test/a.png")).rejects.toThrow(
      "Failed to read file from url: https://files.test/a.png. HTTP 404",
    );
    expect(await source.exists("https://files.test/a.png")).toBe(false);
  });

  it("wraps network failures", async () => {
    const failure = new TypeError("fetch failed");
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw failure;
    });
    const source = new UrlFileSourceAdapter({ tempDir, fetchImpl });

    const error = await source.read("https://files.test/a.png").then(() => null, (e: unknown) => e);

    expect(error).toBeInstanceOf(FileSourceError);
    if (error instanceof FileSourceError) {
      expect(error.message).toBe("Failed to read file from url: https://files.test/a.png. fetch failed");
      expect(error.cause).toBe(failure);
    }
  });

  it("downloads a URL whose path has a malformed escape", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("abc", { headers: { "content-type": "image/png" } }));
    const source = new UrlFileSourceAdapter({ tempDir, fetchImpl });

    const file = await source.read("https://files.test/scan%E0%A4%A.png");

    expect(file.filename).toBe("scan%E0%A4%A.png");
    expect(file.contentPath?.endsWith(".png")).toBe(true);
  });

  it("times out a body that stops arriving", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async (_url, init) => {
      const signal = init?.signal;
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode("partial"));
          signal?.addEventListener("abort", () => controller.error(signal.reason));
        },
      });
      return new Response(body);
    });
    const source = new UrlFileSourceAdapter({ tempDir, fetchImpl, timeoutMs: 20 });

    const error = await source.read("https://files.test/a.png").then(() => null, (e: unknown) => e);

    expect(error).toBeInstanceOf(FileSourceError);
    if (error instanceof FileSourceError) {
      expect(error.message).toBe("Failed to read file from url: https://files.test/a.png. timed out after 20 ms");
    }
  });

  it("reads metadata with a HEAD request", async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      async () => new Response(null, { headers: { "content-type": "application/pdf", "content-length": "2048" } }),
    );
    const source = new UrlFileSourceAdapter({ tempDir, fetchImpl });

    expect(await source.getMetadata("https://files.test/docs/invoice%20march.pdf")).toEqual({
      filename: "invoice march.pdf",
      mimeType: "application/pdf",
      fileSizeBytes: 2048,
    });
    expect(await source.exists("https://files.test/docs/invoice%20march.pdf")).toBe(true);
    expect(fetchImpl.mock.calls.map((call) => call[1]?.method)).toEqual(["HEAD", "HEAD"]);
  });
});
