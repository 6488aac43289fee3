import { INTERVAL_UNIT_MS, type TriggerDescriptor, type TriggerInfo } from "../triggerTypes.js";

/**
 * Describes a trigger for API responses: cron fields, interval seconds, or the ISO run date.
 */
export function triggerInfoGet(trigger: TriggerDescriptor): TriggerInfo {
    switch (trigger.kind) {
        case "cron":
            return {
                type: "cron",
                minute: trigger.minute,
                hour: trigger.hour,
                dayOfMonth: trigger.dayOfMonth,
                month: trigger.month,
                dayOfWeek: trigger.dayOfWeek
            };
        case "interval":
            return { type: "interval", seconds: (trigger.count * INTERVAL_UNIT_MS[trigger.unit]) / 1000 };
        case "date":
            return { type: "date", runDate: trigger.instant.toISOString() };
    }
}
