import { detect } from "chardet";
import iconv from "iconv-lite";

import { FetchError, TimeoutError } from "./errors.js";
import type { Logger } from "./logger.js";

export interface FetcherOptions {
  userAgent: string;
  timeoutMs: number;
  logger: Logger;
}

export type DocumentFetcher = (url: string) => Promise<string>;

const FALLBACK_ENCODING = "utf-8";

/**
 * Decodes a page using the encoding sniffed from its bytes. The upstream site
 * declares charsets that do not always match the payload, so the header is ignored.
 */
export function decodeDocument(bytes: Buffer): string {
  const detected = detect(bytes);
  const encoding = detected && iconv.encodingExists(detected) ? detected : FALLBACK_ENCODING;
  return iconv.decode(bytes, encoding);
}

export function createFetcher(options: FetcherOptions): DocumentFetcher {
  const { userAgent, timeoutMs, logger } = options;

  return async (url: string): Promise<string> => {
    logger.debug("Fetching upstream page", { url });

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: "GET",
        headers: {
          "User-Agent": userAgent,
          Accept: "text/html,application/xhtml+xml",
        },
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timer);
      if (controller.signal.aborted) {
        logger.error("Timeout fetching upstream page", { url, timeoutMs });
        throw new TimeoutError(url, timeoutMs);
      }
      logger.error("Error fetching upstream page", { url, error });
      throw new FetchError(`Could not fetch ${url}`, url, { cause: error });
    }

    try {
      if (!response.ok) {
        throw new FetchError(`Upstream responded with status ${response.status} for ${url}`, url);
      }
      return decodeDocument(Buffer.from(await response.arrayBuffer()));
    } catch (error) {
      if (error instanceof FetchError) {
        logger.error("Unexpected upstream status", { url, status: response.status });
        throw error;
      }
      if (controller.signal.aborted) {
        logger.error("Timeout reading upstream page", { url, timeoutMs });
        throw new TimeoutError(url, timeoutMs);
      }
      logger.error("Error reading upstream page", { url, error });
      throw new FetchError(`Could not read response body from ${url}`, url, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  };
}
