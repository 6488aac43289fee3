import { format, isValid, parseISO } from "date-fns";

import { INTERVAL_UNIT_WORDS } from "../triggerTypes.js";
import { triggerAmountParse } from "./triggerAmountParse.js";

/**
 * Formats a schedule spec for display without requiring it to parse.
 * Returns: e.g. "Every 2 hours", "Cron schedule: 0 9 * * 1-5"; unknown specs are echoed back.
 */
export function triggerHumanReadable(spec: string): string {
    if (spec.startsWith("cron:")) {
        return `Cron schedule: ${spec.slice("cron:".length).trim()}`;
    }
    if (spec.startsWith("every ")) {
        const amount = triggerAmountParse(spec.slice("every ".length));
        return amount ? `Every ${amountFormat(amount.count, amount.unit)}` : spec;
    }
    if (spec.startsWith("at:")) {
        const raw = spec.slice("at:".length).trim();
        const instant = parseISO(raw);
        return isValid(instant) ? `At ${format(instant, "yyyy-MM-dd HH:mm:ss")}` : `At ${raw}`;
    }
    if (spec.startsWith("in ")) {
        const amount = triggerAmountParse(spec.slice("in ".length));
        return amount ? `In ${amountFormat(amount.count, amount.unit)}` : spec;
    }
    return spec;
}

function amountFormat(count: number, unit: keyof typeof INTERVAL_UNIT_WORDS): string {
    const words = INTERVAL_UNIT_WORDS[unit];
    return `${count} ${count === 1 ? words.one : words.many}`;
}
