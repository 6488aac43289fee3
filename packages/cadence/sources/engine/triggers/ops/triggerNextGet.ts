import { cronExpressionParse } from "../../cron/ops/cronExpressionParse.js";
import { cronTimeGetNext } from "../../cron/ops/cronTimeGetNext.js";
import { INTERVAL_UNIT_MS, type TriggerDescriptor } from "../triggerTypes.js";

/**
 * Computes the next fire instant strictly after `from`.
 * Expects: timezone applies to cron triggers only; interval and date triggers are absolute.
 * Returns: the next instant, or null when the trigger will not fire again.
 */
export function triggerNextGet(trigger: TriggerDescriptor, from: Date, timezone: string): Date | null {
    switch (trigger.kind) {
        case "cron": {
            const parsed = cronExpressionParse(
                [trigger.minute, trigger.hour, trigger.dayOfMonth, trigger.month, trigger.dayOfWeek].join(" ")
            );
            return parsed ? cronTimeGetNext(parsed, from, timezone) : null;
        }
        case "interval": {
            const periodMs = trigger.count * INTERVAL_UNIT_MS[trigger.unit];
            const anchorMs = trigger.anchor.getTime();
            const elapsed = from.getTime() - anchorMs;
            const steps = elapsed < 0 ? 1 : Math.floor(elapsed / periodMs) + 1;
            const next = new Date(anchorMs + steps * periodMs);
            return Number.isNaN(next.getTime()) ? null : next;
        }
        case "date":
            return trigger.instant.getTime() > from.getTime() ? trigger.instant : null;
    }
}
