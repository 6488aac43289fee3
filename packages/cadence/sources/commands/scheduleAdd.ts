import { schedulerJobIdBuild } from "../engine/scheduler/schedulerJobIdBuild.js";
import { triggerHumanReadable } from "../engine/triggers/ops/triggerHumanReadable.js";
import { triggerNextGet } from "../engine/triggers/ops/triggerNextGet.js";
import { triggerParse } from "../engine/triggers/ops/triggerParse.js";
import { commandStorageOpen } from "./commandStorageOpen.js";

export type ScheduleAddOptions = {
    settings?: string;
};

/**
 * Stores a schedule for the next `start`; a running scheduler does not pick it up.
 */
export async function scheduleAddCommand(taskId: string, spec: string, options: ScheduleAddOptions): Promise<void> {
    const parsed = triggerParse(spec);
    if (!parsed.ok) {
        console.error(`Invalid schedule: ${parsed.error.message}`);
        process.exitCode = 1;
        return;
    }

    const { config, storage } = await commandStorageOpen(options.settings);
    try {
        const trigger = parsed.trigger;
        const nextRunTime =
            trigger.kind === "date" ? trigger.instant : triggerNextGet(trigger, new Date(), config.scheduler.timezone);
        await storage.schedules.save({
            taskId,
            jobId: schedulerJobIdBuild(taskId),
            scheduleType: trigger.kind,
            scheduleValue: spec,
            nextRunTime: nextRunTime?.getTime() ?? null
        });
        console.log(`Scheduled ${taskId}: ${triggerHumanReadable(spec)}`);
    } finally {
        await storage.close();
    }
}
