import { parse, TextNode, type HTMLElement } from "node-html-parser";

import { OTHER_DATES_MARKER } from "../constants.js";
import { ParseError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { NamedayEntry } from "../types.js";
import { childElements, descendants, firstResult, isTag, nextSiblingNode, strippedText, uniqueInOrder } from "./dom.js";

export interface MonthParseContext {
  month: number;
  sourceUrl: string;
  logger: Logger;
}

const DAY_TABLE_SELECTOR = "table#table0";
const PARENTHESIZED_REGEX = /\s*\([^)]*\)\s*/g;

function parseDayToken(value: string | undefined): number | null {
  const trimmed = value?.trim();
  if (!trimmed || !/^\d+$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
}

function extractDay(cell: HTMLElement): number | null {
  return firstResult([
    () => parseDayToken(cell.getAttribute("name")),
    () => parseDayToken(cell.querySelector("a")?.text),
  ]);
}

function nameLinks(cell: HTMLElement): HTMLElement[] {
  return cell.querySelectorAll("div.name").flatMap((container) => descendants(container, "a"));
}

function extractNames(links: HTMLElement[]): string[] {
  return uniqueInOrder(links.map((link) => link.text.trim()).filter(Boolean));
}

function extractNamesWithOtherDates(links: HTMLElement[]): string[] {
  const flagged = links.filter((link) => {
    const following = nextSiblingNode(link);
    return following instanceof TextNode && following.text.includes(OTHER_DATES_MARKER);
  });
  return extractNames(flagged);
}

function extractSaints(cell: HTMLElement): string[] {
  const saints = firstResult<string[]>([
    () => {
      const emphasized = descendants(cell, "b", "a")
        .map((item) => strippedText(item))
        .filter(Boolean);
      return emphasized.length > 0 ? emphasized : null;
    },
    () => {
      const plain = strippedText(cell, " ").replace(PARENTHESIZED_REGEX, " ").replace(/\s+/g, " ").trim();
      return plain ? [plain] : null;
    },
  ]);
  return uniqueInOrder(saints ?? []);
}

function extractOtherInfo(cells: HTMLElement[]): string[] {
  const notices = firstResult(cells.map((cell) => () => cell.querySelector("span.whats")));
  if (!notices) {
    return [];
  }
  const lines = notices.childNodes
    .filter((child) => !isTag(child, "br"))
    .map((child) => strippedText(child))
    .filter(Boolean);
  return uniqueInOrder(lines);
}

/**
 * Extracts one entry per day from a month page. Rows that do not yield a day
 * number are skipped; a missing day table means the page layout changed.
 */
export function parseMonthPage(html: string, context: MonthParseContext): NamedayEntry[] {
  const { month, sourceUrl, logger } = context;
  const root = parse(html);

  const table = root.querySelector(DAY_TABLE_SELECTOR);
  if (!table) {
    logger.error("Could not find day table on month page", { month, url: sourceUrl });
    throw new ParseError("Could not parse data table from the month page.", sourceUrl);
  }

  const tbody = childElements(table, "tbody").at(0);
  if (!tbody) {
    logger.warn("Day table has no body", { month, url: sourceUrl });
    return [];
  }

  const rows = childElements(tbody, "tr").filter((row) => row.classList.contains("row"));
  const entries: NamedayEntry[] = [];

  for (const row of rows) {
    const cells = childElements(row, "td");
    if (cells.length !== 4) {
      continue;
    }
    const [dayCell, , namesCell, saintsCell] = cells;

    const day = extractDay(dayCell);
    if (day === null) {
      logger.warn("Could not extract day number from row", { month, row: row.toString() });
      continue;
    }

    const links = nameLinks(namesCell);
    entries.push({
      day,
      month,
      celebratingNames: extractNames(links),
      saints: extractSaints(saintsCell),
      otherInfo: extractOtherInfo([namesCell, saintsCell]),
      namesWithOtherDates: extractNamesWithOtherDates(links),
    });
  }

  if (entries.length === 0 && rows.length > 0) {
    logger.warn("No entries extracted although rows were present", { month, rows: rows.length });
  }

  return entries;
}
