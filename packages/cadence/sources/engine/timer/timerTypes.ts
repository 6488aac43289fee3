import type { TriggerDescriptor } from "../triggers/triggerTypes.js";

export type TimerJobRun = () => Promise<void> | void;

export type TimerJobAddOptions = {
    id: string;
    trigger: TriggerDescriptor;
    run: TimerJobRun;
    /** Replace a job registered under the same id instead of throwing. */
    replaceExisting?: boolean;
    /** Overrides the engine-wide instance ceiling for this job. */
    maxInstances?: number;
};

/**
 * Read-only view of a registered job.
 */
export type TimerJobInfo = {
    id: string;
    trigger: TriggerDescriptor;
    nextRunTime: Date | null;
    runningInstances: number;
};

export type TimerEngineOptions = {
    timezone: string;
    /** How late a fire may be and still run. */
    misfireGraceMs: number;
    maxInstances: number;
};

export class JobLookupError extends Error {
    readonly jobId: string;

    constructor(jobId: string) {
        super(`No job by the id of ${jobId} was found`);
        this.name = "JobLookupError";
        this.jobId = jobId;
    }
}
