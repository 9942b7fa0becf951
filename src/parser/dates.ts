import { GREEK_WEEKDAYS, MONTH_NAMES_GENITIVE } from "../constants.js";
import { firstResult } from "./dom.js";

const GREEK_WORD = "[Α-Ωα-ωΆΈΉΊΌΎΏΪΫάέήίόύώϊϋΐΰ]+";
// "1 Ιουλίου", "1 Ιουλίου2025 Τρίτη", "1 Ιουλίου 2025Τρίτη"
const DATE_PATTERN = new RegExp(`^(\\d+)\\s+(${GREEK_WORD})(?:\\s*(\\d{4}))?(?:\\s*(${GREEK_WORD}))?`);

const WEEKDAY_MIN_COVERAGE = 0.7;

export interface ParsedGreekDate {
  day: number;
  month: number;
  /** Month name as written on the page, in the genitive case */
  monthGenitive: string;
  year: number;
  /** Canonical weekday, or the raw token when it matched none. Null when absent. */
  weekday: string | null;
}

interface DateTokens {
  day: string;
  monthGenitive: string;
  year?: string;
  weekday?: string;
}

export function monthFromGenitive(name: string): number | null {
  return Object.hasOwn(MONTH_NAMES_GENITIVE, name) ? MONTH_NAMES_GENITIVE[name] : null;
}

/**
 * Whether a weekday token read from the page stands for `canonical`. The token
 * must occur inside the canonical name and cover at least 70% of it, so a
 * clipped "Τρίτ" is Τρίτη while "Τρ" matches nothing.
 */
export function matchesWeekday(token: string, canonical: string): boolean {
  return canonical.includes(token) && token.length >= canonical.length * WEEKDAY_MIN_COVERAGE;
}

export function resolveWeekday(token: string): string {
  return GREEK_WEEKDAYS.find((canonical) => matchesWeekday(token, canonical)) ?? token;
}

function tokensFromPattern(text: string): DateTokens | null {
  const match = DATE_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  return { day: match[1], monthGenitive: match[2], year: match[3], weekday: match[4] };
}

function tokensFromWhitespace(text: string): DateTokens | null {
  const [day, monthGenitive] = text.split(/\s+/).filter(Boolean);
  if (day === undefined || monthGenitive === undefined) {
    return null;
  }
  return { day, monthGenitive };
}

/**
 * Parses the date cell of a name lookup table. A missing year means the next
 * calendar year after `now`. Returns null when day or month cannot be resolved.
 */
export function parseGreekDate(text: string, now: Date = new Date()): ParsedGreekDate | null {
  const trimmed = text.trim();
  const tokens = firstResult([() => tokensFromPattern(trimmed), () => tokensFromWhitespace(trimmed)]);
  if (!tokens || !/^\d{1,2}$/.test(tokens.day)) {
    return null;
  }

  const day = Number.parseInt(tokens.day, 10);
  const month = monthFromGenitive(tokens.monthGenitive);
  if (month === null || day < 1 || day > 31) {
    return null;
  }

  return {
    day,
    month,
    monthGenitive: tokens.monthGenitive,
    year: tokens.year ? Number.parseInt(tokens.year, 10) : now.getFullYear() + 1,
    weekday: tokens.weekday ? resolveWeekday(tokens.weekday) : null,
  };
}

export function formatGreekDate(date: ParsedGreekDate): string {
  const base = `${date.day} ${date.monthGenitive} ${date.year}`;
  return date.weekday ? `${date.weekday}, ${base}` : base;
}
