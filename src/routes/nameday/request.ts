export class RequestError extends Error {
    constructor(message: string, public status: number) {
        super(message);
    }
}

export function parseMonthParam(value: string): number {
    if (!/^\d{1,2}$/.test(value)) {
        throw new RequestError("Invalid month number. Must be between 1 and 12.", 400);
    }
    return Number.parseInt(value, 10);
}

export function parseNameParam(value: string): string {
    let decoded: string;
    try {
        decoded = decodeURIComponent(value);
    } catch (error) {
        if (error instanceof URIError) {
            throw new RequestError("Invalid name parameter", 400);
        }
        throw error;
    }
    const name = decoded.trim();
    if (!name) {
        throw new RequestError("Name parameter cannot be empty.", 400);
    }
    return name;
}
