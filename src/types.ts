import type { LogLevel } from "./logger.js";

/** Raw environment bindings. Every value is optional and falls back to a default. */
export interface Env {
  SOURCE_BASE_URL?: string;
  USER_AGENT?: string;
  REQUEST_TIMEOUT_MS?: string;
  CACHE_TTL_SECONDS?: string;
  TIMEZONE?: string;
  PORT?: string;
  LOG_LEVEL?: string;
}

export interface Settings {
  baseUrl: string;
  userAgent: string;
  requestTimeoutMs: number;
  cacheTtlMs: number;
  timezone: string;
  port: number;
  logLevel: LogLevel;
}

export interface NamedayEntry {
  /** Day of the month (1-31) */
  day: number;
  /** Month number (1-12), taken from the request rather than the page */
  month: number;
  celebratingNames: string[];
  /** Saints and feasts of the day */
  saints: string[];
  /** Notices such as world days */
  otherInfo: string[];
  /** Names marked with `*`, which are also celebrated on another date */
  namesWithOtherDates: string[];
}

export interface CelebrationDate {
  day: number;
  month: number;
  /** e.g. "Τρίτη, 1 Ιουλίου 2025" */
  dateStr: string;
  saintDescription: string;
  saintUrl: string | null;
  relatedNames: string[];
  /** Only ever set on the first date of a lookup */
  etymology?: string;
}
