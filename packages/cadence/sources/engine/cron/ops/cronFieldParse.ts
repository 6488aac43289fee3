import type { CronField } from "../cronTypes.js";

const NUMBER_PATTERN = /^\d{1,2}$/;
const RANGE_PATTERN = /^(\d{1,2})-(\d{1,2})$/;
const STEP_PATTERN = /^\*\/(\d+)$/;

/**
 * Parses a single cron field (minute, hour, day, month, or weekday).
 *
 * Expects: `*`, a value, a range `a-b`, a comma list of values and ranges, or a wildcard step (every n-th value).
 * Returns: CronField with values set, or null if the field is malformed or out of bounds.
 */
export function cronFieldParse(field: string, min: number, max: number): CronField | null {
    if (field === "*") {
        return { values: new Set(), any: true };
    }

    const values = new Set<number>();

    const step = STEP_PATTERN.exec(field);
    if (step) {
        const size = Number(step[1]);
        if (size <= 0) {
            return null;
        }
        for (let i = min; i <= max; i += size) {
            values.add(i);
        }
        return { values, any: false };
    }

    for (const part of field.split(",")) {
        const range = RANGE_PATTERN.exec(part);
        if (range) {
            const start = Number(range[1]);
            const end = Number(range[2]);
            if (start < min || end > max || start > end) {
                return null;
            }
            for (let i = start; i <= end; i++) {
                values.add(i);
            }
            continue;
        }
        if (!NUMBER_PATTERN.test(part)) {
            return null;
        }
        const value = Number(part);
        if (value < min || value > max) {
            return null;
        }
        values.add(value);
    }

    return { values, any: false };
}
