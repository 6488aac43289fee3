import { CRON_FIELD_BOUNDS, type ParsedCron } from "../cronTypes.js";
import { cronFieldParse } from "./cronFieldParse.js";

/**
 * Parses a 5-field cron expression into its components.
 *
 * Expects: cron expression string with format "minute hour day month weekday".
 * Returns: ParsedCron object or null if the expression is invalid.
 */
export function cronExpressionParse(expression: string): ParsedCron | null {
    const parts = expression.trim().split(/\s+/);
    const [minuteStr, hourStr, dayStr, monthStr, weekdayStr] = parts;
    if (
        parts.length !== 5 ||
        minuteStr === undefined ||
        hourStr === undefined ||
        dayStr === undefined ||
        monthStr === undefined ||
        weekdayStr === undefined
    ) {
        return null;
    }

    const minute = cronFieldParse(minuteStr, CRON_FIELD_BOUNDS.minute.min, CRON_FIELD_BOUNDS.minute.max);
    const hour = cronFieldParse(hourStr, CRON_FIELD_BOUNDS.hour.min, CRON_FIELD_BOUNDS.hour.max);
    const day = cronFieldParse(dayStr, CRON_FIELD_BOUNDS.day.min, CRON_FIELD_BOUNDS.day.max);
    const month = cronFieldParse(monthStr, CRON_FIELD_BOUNDS.month.min, CRON_FIELD_BOUNDS.month.max);
    const weekday = cronFieldParse(weekdayStr, CRON_FIELD_BOUNDS.weekday.min, CRON_FIELD_BOUNDS.weekday.max);

    if (!minute || !hour || !day || !month || !weekday) {
        return null;
    }

    return { minute, hour, day, month, weekday };
}
