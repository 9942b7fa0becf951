import { ResultCache } from "./cache.js";
import { MONTH_CACHE_SIZE, MONTH_NAMES_NOMINATIVE, NAME_CACHE_SIZE } from "./constants.js";
import { InvalidArgumentError } from "./errors.js";
import type { DocumentFetcher } from "./fetcher.js";
import type { Logger } from "./logger.js";
import { parseMonthPage } from "./parser/month.js";
import { parseNamePage } from "./parser/name.js";
import type { CelebrationDate, NamedayEntry } from "./types.js";

export interface ExtractionCaches {
  months: ResultCache<number, NamedayEntry[]>;
  names: ResultCache<string, CelebrationDate[]>;
}

export interface ExtractionContext {
  baseUrl: string;
  fetchDocument: DocumentFetcher;
  caches: ExtractionCaches;
  logger: Logger;
  now?: () => Date;
}

export function createExtractionCaches(ttlMs: number, now?: () => number): ExtractionCaches {
  return {
    months: new ResultCache({ maxEntries: MONTH_CACHE_SIZE, ttlMs, now }),
    names: new ResultCache({ maxEntries: NAME_CACHE_SIZE, ttlMs, now }),
  };
}

export function isValidMonth(month: number): boolean {
  return Number.isInteger(month) && month >= 1 && month <= 12;
}

export function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, " ").normalize("NFC");
}

export function buildMonthUrl(baseUrl: string, month: number): string {
  return `${baseUrl}/month/${month}/${encodeURIComponent(MONTH_NAMES_NOMINATIVE[month])}`;
}

export function buildNameUrl(baseUrl: string, name: string): string {
  return `${baseUrl}/pote_giortazei/${encodeURIComponent(name)}`;
}

export async function extractMonth(month: number, context: ExtractionContext): Promise<NamedayEntry[]> {
  if (!isValidMonth(month)) {
    throw new InvalidArgumentError("Invalid month number. Must be between 1 and 12.");
  }

  return context.caches.months.getOrCompute(month, async () => {
    const url = buildMonthUrl(context.baseUrl, month);
    context.logger.info("Fetching monthly data", { month, url });
    const html = await context.fetchDocument(url);
    return parseMonthPage(html, { month, sourceUrl: url, logger: context.logger });
  });
}

export async function extractNameDates(name: string, context: ExtractionContext): Promise<CelebrationDate[]> {
  const key = normalizeName(name);
  if (!key) {
    throw new InvalidArgumentError("Name parameter cannot be empty.");
  }

  return context.caches.names.getOrCompute(key, async () => {
    const url = buildNameUrl(context.baseUrl, key);
    context.logger.info("Fetching celebration dates", { name: key, url });
    const html = await context.fetchDocument(url);
    return parseNamePage(html, {
      name: key,
      baseUrl: context.baseUrl,
      sourceUrl: url,
      logger: context.logger,
      now: context.now?.(),
    });
  });
}
