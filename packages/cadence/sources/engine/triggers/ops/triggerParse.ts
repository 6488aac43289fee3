import { isValid, parseISO } from "date-fns";

import { getLogger } from "../../../log.js";
import { cronExpressionParse } from "../../cron/ops/cronExpressionParse.js";
import { INTERVAL_UNIT_MS, type IntervalUnit, ParseError, type TriggerParseResult } from "../triggerTypes.js";
import { triggerAmountParse } from "./triggerAmountParse.js";

const logger = getLogger("scheduler.triggers");

export type TriggerParseOptions = {
    /** Anchor for interval triggers; defaults to `now`. */
    startTime?: Date;
    now?: Date;
};

/**
 * Parses a schedule spec (`cron:`, `every `, `at:`, `in `) into a trigger descriptor.
 * Expects: raw spec as supplied by the caller; nothing is trimmed before prefix dispatch.
 * Returns: the descriptor, or a ParseError describing the first problem found.
 */
export function triggerParse(spec: string, options: TriggerParseOptions = {}): TriggerParseResult {
    const now = options.now ?? new Date();

    if (spec.startsWith("cron:")) {
        const expression = spec.slice("cron:".length).trim();
        const parsed = cronExpressionParse(expression);
        const [minute, hour, dayOfMonth, month, dayOfWeek] = expression.split(/\s+/);
        if (
            !parsed ||
            minute === undefined ||
            hour === undefined ||
            dayOfMonth === undefined ||
            month === undefined ||
            dayOfWeek === undefined
        ) {
            return failure(spec, `invalid cron expression: ${expression}`);
        }
        return { ok: true, trigger: { kind: "cron", minute, hour, dayOfMonth, month, dayOfWeek } };
    }

    if (spec.startsWith("every ")) {
        const amount = triggerAmountParse(spec.slice("every ".length));
        if (!amount) {
            return failure(spec, `invalid interval specification: ${spec.slice("every ".length).trim()}`);
        }
        if (amount.count <= 0) {
            return failure(spec, `interval value must be positive: ${amount.count}`);
        }
        const anchor = options.startTime ?? now;
        if (!instantOffsetValid(anchor, amount.count, amount.unit)) {
            return failure(spec, `interval value out of range: ${amount.count}`);
        }
        return {
            ok: true,
            trigger: { kind: "interval", unit: amount.unit, count: amount.count, anchor }
        };
    }

    if (spec.startsWith("at:")) {
        const raw = spec.slice("at:".length).trim();
        const instant = parseISO(raw);
        if (!isValid(instant)) {
            return failure(spec, `invalid date: ${raw}`);
        }
        if (instant.getTime() <= now.getTime()) {
            logger.warn({ spec }, "parse: Date is in the past");
        }
        return { ok: true, trigger: { kind: "date", instant } };
    }

    if (spec.startsWith("in ")) {
        const amount = triggerAmountParse(spec.slice("in ".length));
        if (!amount) {
            return failure(spec, `invalid relative specification: ${spec.slice("in ".length).trim()}`);
        }
        if (amount.count <= 0) {
            return failure(spec, `relative value must be positive: ${amount.count}`);
        }
        if (!instantOffsetValid(now, amount.count, amount.unit)) {
            return failure(spec, `relative value out of range: ${amount.count}`);
        }
        return { ok: true, trigger: { kind: "date", instant: relativeInstant(now, amount.count, amount.unit) } };
    }

    return failure(spec, "unrecognized schedule format");
}

// Date holds at most 8.64e15 ms either side of the epoch.
function instantOffsetValid(base: Date, count: number, unit: IntervalUnit): boolean {
    if (!Number.isSafeInteger(count) || !isValid(base)) {
        return false;
    }
    return isValid(relativeInstant(base, count, unit));
}

function relativeInstant(now: Date, count: number, unit: IntervalUnit): Date {
    return new Date(now.getTime() + count * INTERVAL_UNIT_MS[unit]);
}

function failure(spec: string, message: string): TriggerParseResult {
    return { ok: false, error: new ParseError(spec, message) };
}
