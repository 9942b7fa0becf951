import { afterEach, describe, expect, it, vi } from "vitest";

import { FetchError, TimeoutError } from "../src/errors.js";
import { createFetcher, decodeDocument } from "../src/fetcher.js";
import { createTestLogger } from "./helpers.js";

const url = "https://www.eortologio.net/pote_giortazei/test";

describe("createFetcher", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends the configured user agent and decodes Greek text", async () => {
    const html = "<h1>Πότε γιορτάζει το όνομα Γεώργιος</h1>";
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(html, { status: 200, headers: { "Content-Type": "text/html; charset=iso-8859-1" } }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const fetchDocument = createFetcher({ userAgent: "test/0.1", timeoutMs: 1_000, logger: createTestLogger() });

    await expect(fetchDocument(url)).resolves.toBe(html);
    expect(fetchMock).toHaveBeenCalledOnce();
    const init = fetchMock.mock.calls[0]?.[1];
    expect(new Headers(init?.headers).get("User-Agent")).toBe("test/0.1");
    expect(init?.method).toBe("GET");
  });

  it("fails with FetchError on a non-2xx status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("Not Found", { status: 404 })));
    const fetchDocument = createFetcher({ userAgent: "test/0.1", timeoutMs: 1_000, logger: createTestLogger() });

    const error = await fetchDocument(url).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ url, status: 503 });
  });

  it("fails with FetchError carrying the cause on network errors", async () => {
    const cause = new TypeError("fetch failed");
    vi.stubGlobal("fetch", vi.fn(async () => Promise.reject(cause)));
    const fetchDocument = createFetcher({ userAgent: "test/0.1", timeoutMs: 1_000, logger: createTestLogger() });

    const error = await fetchDocument(url).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ url, cause });
  });

  it("fails with TimeoutError when no response arrives in time", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new DOMException("aborted", "AbortError")));
          }),
      ),
    );
    const logger = createTestLogger();
    const fetchDocument = createFetcher({ userAgent: "test/0.1", timeoutMs: 20, logger });

    const error = await fetchDocument(url).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ url, timeoutMs: 20, status: 504 });
    expect(logger.error).toHaveBeenCalledWith("Timeout fetching upstream page", { url, timeoutMs: 20 });
  });
});

describe("decodeDocument", () => {
  it("decodes plain ASCII unchanged", () => {
    expect(decodeDocument(Buffer.from("<html>plain</html>"))).toBe("<html>plain</html>");
  });

  it("decodes UTF-8 Greek regardless of declared charset", () => {
    const text = "Καλή σας μέρα, χρόνια πολλά στους εορτάζοντες";

    expect(decodeDocument(Buffer.from(text, "utf8"))).toBe(text);
  });
});
