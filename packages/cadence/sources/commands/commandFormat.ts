import { triggerHumanReadable } from "../engine/triggers/ops/triggerHumanReadable.js";
import type { ScheduleDbRecord, TaskRunDbRecord } from "../storage/databaseTypes.js";

export function scheduleLineFormat(schedule: ScheduleDbRecord): string {
    const next = schedule.nextRunTime === null ? "-" : new Date(schedule.nextRunTime).toISOString();
    return `${schedule.taskId}\t${triggerHumanReadable(schedule.scheduleValue)}\tnext=${next}`;
}

/**
 * One run per line: start time, status, duration, then the error when there is one.
 */
export function runLineFormat(run: TaskRunDbRecord): string {
    const started = new Date(run.startTime).toISOString();
    const duration = run.endTime === null ? "-" : `${run.endTime - run.startTime}ms`;
    const parts = [started, run.status, duration];
    if (run.error) {
        parts.push(run.error);
    }
    return parts.join("\t");
}
