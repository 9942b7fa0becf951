import { describe, expect, it } from "vitest";

import { formatGreekDate, matchesWeekday, monthFromGenitive, parseGreekDate, resolveWeekday } from "../src/parser/dates.js";

const now = new Date("2026-10-18T12:00:00Z");

describe("parseGreekDate", () => {
  it("reads a year glued to the month and a trailing weekday", () => {
    const parsed = parseGreekDate("1 Ιουλίου2025 Τρίτη", now);

    expect(parsed).toEqual({ day: 1, month: 7, monthGenitive: "Ιουλίου", year: 2025, weekday: "Τρίτη" });
    expect(parsed && formatGreekDate(parsed)).toBe("Τρίτη, 1 Ιουλίου 2025");
  });

  it("reads a weekday glued to the year", () => {
    expect(parseGreekDate("21 Μαΐου 2027Παρασκευή", now)).toEqual({
      day: 21,
      month: 5,
      monthGenitive: "Μαΐου",
      year: 2027,
      weekday: "Παρασκευή",
    });
  });

  it("defaults the year to the year after now", () => {
    const parsed = parseGreekDate("6 Δεκεμβρίου", now);

    expect(parsed).toEqual({ day: 6, month: 12, monthGenitive: "Δεκεμβρίου", year: 2027, weekday: null });
    expect(parsed && formatGreekDate(parsed)).toBe("6 Δεκεμβρίου 2027");
  });

  it("keeps an unrecognised weekday token verbatim", () => {
    expect(parseGreekDate("1 Ιουλίου2025 Τρ", now)?.weekday).toBe("Τρ");
  });

  it("returns null for an unknown month", () => {
    expect(parseGreekDate("5 Φλεβάρη", now)).toBeNull();
  });

  it("returns null when the day is not a number", () => {
    expect(parseGreekDate("Κινητή εορτή", now)).toBeNull();
    expect(parseGreekDate("", now)).toBeNull();
  });

  it("ignores trailing text after the month", () => {
    expect(parseGreekDate("7 Ιανουαρίου, Σύναξη", now)).toEqual({
      day: 7,
      month: 1,
      monthGenitive: "Ιανουαρίου",
      year: 2027,
      weekday: null,
    });
  });
});

describe("matchesWeekday", () => {
  it("accepts a clipped token covering at least 70% of the name", () => {
    expect(matchesWeekday("Τρίτ", "Τρίτη")).toBe(true);
    expect(matchesWeekday("Τρίτη", "Τρίτη")).toBe(true);
  });

  it("rejects short or foreign tokens", () => {
    expect(matchesWeekday("Τρ", "Τρίτη")).toBe(false);
    expect(matchesWeekday("Τρίτη", "Τετάρτη")).toBe(false);
  });
});

describe("resolveWeekday", () => {
  it("maps clipped tokens to the canonical weekday", () => {
    expect(resolveWeekday("Τρίτ")).toBe("Τρίτη");
    expect(resolveWeekday("Κυριακ")).toBe("Κυριακή");
  });

  it("returns the token when nothing matches", () => {
    expect(resolveWeekday("Τρ")).toBe("Τρ");
  });
});

describe("monthFromGenitive", () => {
  it("maps genitive names and rejects others", () => {
    expect(monthFromGenitive("Σεπτεμβρίου")).toBe(9);
    expect(monthFromGenitive("Σεπτέμβριος")).toBeNull();
    expect(monthFromGenitive("toString")).toBeNull();
  });
});
