/**
 * A single field from a parsed cron expression.
 */
export type CronField = {
    values: Set<number>;
    any: boolean;
};

/**
 * Parsed 5-field cron expression.
 */
export type ParsedCron = {
    minute: CronField;
    hour: CronField;
    day: CronField;
    month: CronField;
    weekday: CronField;
};

export type CronFieldName = keyof ParsedCron;

export const CRON_FIELD_BOUNDS: Record<CronFieldName, { min: number; max: number }> = {
    minute: { min: 0, max: 59 },
    hour: { min: 0, max: 23 },
    day: { min: 1, max: 31 },
    month: { min: 1, max: 12 },
    weekday: { min: 0, max: 6 }
};
