export interface CalendarDate {
    year: number;
    month: number;
    day: number;
}

export function pad(value: number): string {
    return value.toString().padStart(2, "0");
}

export function formatIsoDate(date: CalendarDate): string {
    return `${date.year}-${pad(date.month)}-${pad(date.day)}`;
}

export function extractCurrentDate(timezone: string, now: Date = new Date()): CalendarDate {
    const parts = new Intl.DateTimeFormat("en-GB", {
        timeZone: timezone,
        year: "numeric",
        month: "numeric",
        day: "numeric",
    }).formatToParts(now);

    const year = Number.parseInt(parts.find((part) => part.type === "year")?.value ?? "", 10);
    const month = Number.parseInt(parts.find((part) => part.type === "month")?.value ?? "", 10);
    const day = Number.parseInt(parts.find((part) => part.type === "day")?.value ?? "", 10);

    return {
        year: Number.isFinite(year) ? year : now.getUTCFullYear(),
        month: Number.isFinite(month) ? month : now.getUTCMonth() + 1,
        day: Number.isFinite(day) ? day : now.getUTCDate(),
    };
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
    const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
    return {
        year: shifted.getUTCFullYear(),
        month: shifted.getUTCMonth() + 1,
        day: shifted.getUTCDate(),
    };
}
