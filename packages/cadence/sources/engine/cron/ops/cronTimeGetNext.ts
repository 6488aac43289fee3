import type { CronField, ParsedCron } from "../cronTypes.js";

type CronDateParts = {
    month: number;
    day: number;
    weekday: number;
    hour: number;
    minute: number;
};

const MINUTE_MS = 60_000;
// Give up after two years without a match (e.g. "0 0 31 2 *").
const SEARCH_WINDOW_MS = 2 * 366 * 24 * 60 * MINUTE_MS;

const WEEKDAY_TO_INDEX: Record<string, number> = {
    Sun: 0,
    Mon: 1,
    Tue: 2,
    Wed: 3,
    Thu: 4,
    Fri: 5,
    Sat: 6
};

/**
 * Calculates the next time a parsed cron expression fires strictly after `from`.
 *
 * Expects: timezone is an IANA identifier; empty means process local time.
 * Returns: the next matching whole-minute Date, or null for an unknown timezone or no match within two years.
 */
export function cronTimeGetNext(cron: ParsedCron, from: Date, timezone?: string): Date | null {
    const normalizedTimezone = timezone?.trim() ?? "";
    const formatter = timezoneFormatterBuild(normalizedTimezone);
    if (normalizedTimezone && !formatter) {
        return null;
    }

    const startMs = from.getTime();
    const limitMs = startMs + SEARCH_WINDOW_MS;
    let candidateMs = Math.floor(startMs / MINUTE_MS) * MINUTE_MS + MINUTE_MS;

    while (candidateMs <= limitMs) {
        const candidate = new Date(candidateMs);
        const parts = formatter ? datePartsInTimezone(candidate, formatter) : datePartsInLocalTimezone(candidate);

        const dateMatches =
            fieldMatch(cron.month, parts.month) &&
            fieldMatch(cron.day, parts.day) &&
            fieldMatch(cron.weekday, parts.weekday);
        if (!dateMatches || !fieldMatch(cron.hour, parts.hour)) {
            // Jump to the next local hour boundary.
            candidateMs += (60 - parts.minute) * MINUTE_MS;
            continue;
        }
        if (fieldMatch(cron.minute, parts.minute)) {
            return candidate;
        }
        candidateMs += MINUTE_MS;
    }

    return null;
}

function fieldMatch(field: CronField, value: number): boolean {
    return field.any || field.values.has(value);
}

function datePartsInLocalTimezone(date: Date): CronDateParts {
    return {
        month: date.getMonth() + 1,
        day: date.getDate(),
        weekday: date.getDay(),
        hour: date.getHours(),
        minute: date.getMinutes()
    };
}

function timezoneFormatterBuild(timezone: string): Intl.DateTimeFormat | null {
    if (!timezone) {
        return null;
    }
    try {
        return new Intl.DateTimeFormat("en-US", {
            timeZone: timezone,
            weekday: "short",
            month: "numeric",
            day: "numeric",
            hour: "numeric",
            minute: "numeric",
            hour12: false
        });
    } catch {
        return null;
    }
}

function datePartsInTimezone(date: Date, formatter: Intl.DateTimeFormat): CronDateParts {
    const parts = formatter.formatToParts(date);
    const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((entry) => entry.type === type)?.value ?? "";
    return {
        month: Number(part("month")),
        day: Number(part("day")),
        // "24" shows up for midnight in some ICU builds.
        hour: Number(part("hour")) % 24,
        minute: Number(part("minute")),
        weekday: WEEKDAY_TO_INDEX[part("weekday")] ?? -1
    };
}
