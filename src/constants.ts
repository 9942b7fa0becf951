export const DEFAULT_BASE_URL = "https://www.eortologio.net";
export const DEFAULT_TIMEZONE = "Europe/Athens";
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36";
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;
export const DEFAULT_CACHE_TTL_SECONDS = 6 * 60 * 60;
export const DEFAULT_PORT = 8000;

export const MONTH_CACHE_SIZE = 12;
export const NAME_CACHE_SIZE = 200;

export const MONTH_NAMES_NOMINATIVE: Readonly<Record<number, string>> = {
  1: "Ιανουάριος",
  2: "Φεβρουάριος",
  3: "Μάρτιος",
  4: "Απρίλιος",
  5: "Μάιος",
  6: "Ιούνιος",
  7: "Ιούλιος",
  8: "Αύγουστος",
  9: "Σεπτέμβριος",
  10: "Οκτώβριος",
  11: "Νοέμβριος",
  12: "Δεκέμβριος",
};

export const MONTH_NAMES_GENITIVE: Readonly<Record<string, number>> = {
  "Ιανουαρίου": 1,
  "Φεβρουαρίου": 2,
  "Μαρτίου": 3,
  "Απριλίου": 4,
  "Μαΐου": 5,
  "Ιουνίου": 6,
  "Ιουλίου": 7,
  "Αυγούστου": 8,
  "Σεπτεμβρίου": 9,
  "Οκτωβρίου": 10,
  "Νοεμβρίου": 11,
  "Δεκεμβρίου": 12,
};

export const GREEK_WEEKDAYS = [
  "Δευτέρα",
  "Τρίτη",
  "Τετάρτη",
  "Πέμπτη",
  "Παρασκευή",
  "Σάββατο",
  "Κυριακή",
] as const;

export const NOT_FOUND_PHRASE = "δεν βρέθηκε";
export const ETYMOLOGY_HEADING = "Πιθανή Ετυμολογία / Τι σημαίνει";
export const ETYMOLOGY_MARKERS = ["Πιθανή Ετυμολογία", "σημαίνει:"] as const;
export const SEE_MORE_MARKER = ">>";
export const OTHER_DATES_MARKER = "*";
