import { NotFoundError } from "../../errors.js";
import { extractMonth, extractNameDates, type ExtractionContext } from "../../extract.js";
import { addDays, extractCurrentDate, formatIsoDate } from "../../utils.js";
import { parseMonthParam, parseNameParam } from "./request.js";

export interface RouteContext extends ExtractionContext {
    timezone: string;
}

function jsonResponse(body: unknown): Response {
    return Response.json(body, {
        headers: {
            "Cache-Control": "public, max-age=300",
            "Access-Control-Allow-Origin": "*",
        },
    });
}

function currentDate(context: RouteContext) {
    return extractCurrentDate(context.timezone, context.now?.() ?? new Date());
}

async function handleDayRequest(offsetDays: number, label: string, context: RouteContext): Promise<Response> {
    const target = addDays(currentDate(context), offsetDays);
    const entries = await extractMonth(target.month, context);
    const entry = entries.find((candidate) => candidate.day === target.day && candidate.month === target.month);
    if (!entry) {
        const iso = formatIsoDate(target);
        context.logger.warn(`No data found for ${label}`, { date: iso });
        throw new NotFoundError(`No nameday information found for ${label} (${iso}).`);
    }
    return jsonResponse(entry);
}

export function handleTodayRequest(context: RouteContext): Promise<Response> {
    return handleDayRequest(0, "today", context);
}

export function handleTomorrowRequest(context: RouteContext): Promise<Response> {
    return handleDayRequest(1, "tomorrow", context);
}

export async function handleMonthRequest(monthParam: string | undefined, context: RouteContext): Promise<Response> {
    const month = monthParam === undefined ? currentDate(context).month : parseMonthParam(monthParam);
    return jsonResponse(await extractMonth(month, context));
}

export async function handleSearchRequest(nameParam: string, context: RouteContext): Promise<Response> {
    const name = parseNameParam(nameParam);
    return jsonResponse(await extractNameDates(name, context));
}
