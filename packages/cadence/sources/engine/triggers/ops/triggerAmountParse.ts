import type { IntervalUnit } from "../triggerTypes.js";

const AMOUNT_PATTERN = /^(\d+)([smhd])$/;

/**
 * Parses an `<N><unit>` amount such as "30m".
 * Returns: count and unit, or null when the text does not match; zero is returned as-is.
 */
export function triggerAmountParse(text: string): { count: number; unit: IntervalUnit } | null {
    const match = AMOUNT_PATTERN.exec(text.trim());
    if (!match) {
        return null;
    }
    const unit = unitParse(match[2]);
    if (!unit) {
        return null;
    }
    return { count: Number(match[1]), unit };
}

function unitParse(value: string | undefined): IntervalUnit | null {
    switch (value) {
        case "s":
        case "m":
        case "h":
        case "d":
            return value;
        default:
            return null;
    }
}
