import { parse, type HTMLElement } from "node-html-parser";

import { ETYMOLOGY_HEADING, ETYMOLOGY_MARKERS, NOT_FOUND_PHRASE, SEE_MORE_MARKER } from "../constants.js";
import { NotFoundError, ParseError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { CelebrationDate } from "../types.js";
import { formatGreekDate, parseGreekDate } from "./dates.js";
import { descendants, firstResult, followingSiblingElements, isTag, strippedText, uniqueInOrder } from "./dom.js";

export interface NameParseContext {
  name: string;
  baseUrl: string;
  sourceUrl: string;
  logger: Logger;
  now?: Date;
}

const ETYMOLOGY_CANDIDATE_TAGS = ["p", "div", "h2", "h3"];

export function headingMentionsName(heading: HTMLElement | null, name: string): boolean {
  return heading !== null && heading.text.toLowerCase().includes(name.toLowerCase());
}

export function reportsNotFound(content: HTMLElement): boolean {
  return content.text.includes(NOT_FOUND_PHRASE);
}

export function hasEtymologyMarker(text: string): boolean {
  return ETYMOLOGY_MARKERS.some((marker) => text.includes(marker));
}

export function absoluteUrl(href: string, baseUrl: string): string {
  if (/^https?:\/\//i.test(href)) {
    return href;
  }
  return `${baseUrl}${href.startsWith("/") ? "" : "/"}${href}`;
}

function extractRelatedNames(cell: HTMLElement | undefined): string[] {
  if (!cell || cell.text.includes(SEE_MORE_MARKER)) {
    return [];
  }
  return uniqueInOrder(
    descendants(cell, "a")
      .map((link) => link.text.trim())
      .filter(Boolean),
  );
}

function extractEtymology(table: HTMLElement): string | null {
  for (const sibling of followingSiblingElements(table)) {
    if (!isTag(sibling, ...ETYMOLOGY_CANDIDATE_TAGS)) {
      continue;
    }
    const text = strippedText(sibling, " ");
    if (!text || !hasEtymologyMarker(text)) {
      continue;
    }
    return firstResult([
      () => {
        const colon = text.indexOf(":");
        return colon >= 0 ? text.slice(colon + 1).trim() : null;
      },
      () => text.replace(ETYMOLOGY_HEADING, "").trim(),
    ]);
  }
  return null;
}

/**
 * Extracts the celebration dates listed on a name lookup page. A heading that
 * names the query but no date table means the name exists with no dates.
 */
export function parseNamePage(html: string, context: NameParseContext): CelebrationDate[] {
  const { name, baseUrl, sourceUrl, logger } = context;
  const now = context.now ?? new Date();
  const root = parse(html);

  const content = root.querySelector("div.post-content");
  if (!content) {
    logger.error("Could not find content region on name page", { name, url: sourceUrl });
    throw new ParseError("Could not parse name search results page structure.", sourceUrl);
  }

  const confirmed = headingMentionsName(content.querySelector("h1"), name);
  if (!confirmed) {
    if (reportsNotFound(content)) {
      logger.info("Name not found upstream", { name });
      throw new NotFoundError(`Name '${name}' not found.`);
    }
    logger.warn("Heading does not mention the name, parsing table anyway", { name, url: sourceUrl });
  }

  const table = content.querySelector("table.calendar");
  if (!table) {
    if (confirmed) {
      logger.warn("Name page has no date table", { name, url: sourceUrl });
      return [];
    }
    throw new NotFoundError(`Name '${name}' not found or no data available in expected format.`);
  }

  const dates: CelebrationDate[] = [];
  for (const row of table.querySelectorAll("tr")) {
    const cells = row.querySelectorAll("td");
    if (cells.length < 2) {
      continue;
    }
    const [dateCell, saintCell, namesCell] = cells;

    const dateText = strippedText(dateCell);
    const parsed = parseGreekDate(dateText, now);
    if (!parsed) {
      logger.warn("Could not parse date cell", { name, text: dateText });
      continue;
    }
    logger.debug("Parsed date cell", { name, text: dateText, ...parsed });

    const href = saintCell.querySelector("a")?.getAttribute("href")?.trim();
    dates.push({
      day: parsed.day,
      month: parsed.month,
      dateStr: formatGreekDate(parsed),
      saintDescription: strippedText(saintCell),
      saintUrl: href ? absoluteUrl(href, baseUrl) : null,
      relatedNames: extractRelatedNames(namesCell),
    });
  }

  const etymology = extractEtymology(table);
  if (etymology && dates.length > 0) {
    dates[0] = { ...dates[0], etymology };
  }

  return dates;
}
