export type IntervalUnit = "s" | "m" | "h" | "d";

export type CronTrigger = {
    kind: "cron";
    minute: string;
    hour: string;
    dayOfMonth: string;
    month: string;
    dayOfWeek: string;
};

export type IntervalTrigger = {
    kind: "interval";
    unit: IntervalUnit;
    count: number;
    anchor: Date;
};

export type DateTrigger = {
    kind: "date";
    instant: Date;
};

/**
 * Parsed schedule spec. Only produced for structurally valid specs.
 */
export type TriggerDescriptor = CronTrigger | IntervalTrigger | DateTrigger;

/** Persisted `schedule_type` values; "unknown" only appears on imported legacy rows. */
export type ScheduleType = TriggerDescriptor["kind"] | "unknown";

export type TriggerParseResult = { ok: true; trigger: TriggerDescriptor } | { ok: false; error: ParseError };

export type TriggerInfo =
    | {
          type: "cron";
          minute: string;
          hour: string;
          dayOfMonth: string;
          month: string;
          dayOfWeek: string;
      }
    | { type: "interval"; seconds: number }
    | { type: "date"; runDate: string };

export class ParseError extends Error {
    readonly spec: string;

    constructor(spec: string, message: string) {
        super(message);
        this.name = "ParseError";
        this.spec = spec;
    }
}

export const INTERVAL_UNIT_MS: Record<IntervalUnit, number> = {
    s: 1_000,
    m: 60_000,
    h: 3_600_000,
    d: 86_400_000
};

export const INTERVAL_UNIT_WORDS: Record<IntervalUnit, { one: string; many: string }> = {
    s: { one: "second", many: "seconds" },
    m: { one: "minute", many: "minutes" },
    h: { one: "hour", many: "hours" },
    d: { one: "day", many: "days" }
};
