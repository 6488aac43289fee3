import { getLogger } from "../../log.js";
import { triggerNextGet } from "../triggers/ops/triggerNextGet.js";
import type { TriggerDescriptor } from "../triggers/triggerTypes.js";
import {
    JobLookupError,
    type TimerEngineOptions,
    type TimerJobAddOptions,
    type TimerJobInfo,
    type TimerJobRun
} from "./timerTypes.js";

const logger = getLogger("scheduler.timer");

const TICK_MAX_MS = 60 * 1000;

type TimerJob = {
    id: string;
    trigger: TriggerDescriptor;
    run: TimerJobRun;
    maxInstances: number;
    nextRunTime: Date | null;
    runningInstances: number;
};

/**
 * Time-driven job table with a single tick loop.
 * Missed fires are coalesced into one; fires later than the misfire grace are dropped.
 * Jobs with no further fire time are removed after their last dispatch.
 */
export class TimerEngine {
    private readonly timezone: string;
    private readonly misfireGraceMs: number;
    private readonly maxInstances: number;
    private jobs = new Map<string, TimerJob>();
    private inFlight = new Set<Promise<void>>();
    private started = false;
    private stopped = false;
    private tickTimer: NodeJS.Timeout | null = null;

    constructor(options: TimerEngineOptions) {
        this.timezone = options.timezone;
        this.misfireGraceMs = options.misfireGraceMs;
        this.maxInstances = options.maxInstances;
    }

    start(): void {
        if (this.started || this.stopped) {
            return;
        }
        this.started = true;
        logger.debug({ jobCount: this.jobs.size }, "start: Timer engine started");
        this.scheduleNextTick();
    }

    /**
     * Stops the tick loop. In-flight runs are left to finish; see drain().
     */
    shutdown(): void {
        if (this.stopped) {
            return;
        }
        this.stopped = true;
        if (this.tickTimer) {
            clearTimeout(this.tickTimer);
            this.tickTimer = null;
        }
        logger.debug({ inFlight: this.inFlight.size }, "stop: Timer engine stopped");
    }

    /** Resolves once every dispatched run has settled. */
    async drain(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.allSettled([...this.inFlight]);
        }
    }

    isRunning(): boolean {
        return this.started && !this.stopped;
    }

    addJob(options: TimerJobAddOptions): TimerJobInfo {
        if (this.jobs.has(options.id) && !options.replaceExisting) {
            throw new Error(`Job identifier (${options.id}) conflicts with an existing job`);
        }

        const job: TimerJob = {
            id: options.id,
            trigger: options.trigger,
            run: options.run,
            maxInstances: options.maxInstances ?? this.maxInstances,
            nextRunTime: this.firstRunTimeGet(options.trigger),
            runningInstances: 0
        };
        if (!job.nextRunTime) {
            logger.warn({ jobId: job.id }, "schedule: Job has no fire time and will not run");
        }
        this.jobs.set(job.id, job);
        this.scheduleNextTick();
        return jobInfo(job);
    }

    /**
     * Removes a job by id.
     * Expects: the job exists; throws JobLookupError otherwise.
     */
    removeJob(id: string): void {
        if (!this.jobs.delete(id)) {
            throw new JobLookupError(id);
        }
        this.scheduleNextTick();
    }

    getJob(id: string): TimerJobInfo | null {
        const job = this.jobs.get(id);
        return job ? jobInfo(job) : null;
    }

    jobsList(): TimerJobInfo[] {
        return Array.from(this.jobs.values()).map(jobInfo);
    }

    private firstRunTimeGet(trigger: TriggerDescriptor): Date | null {
        // One-shots keep their instant even when past so the misfire check can report them.
        if (trigger.kind === "date") {
            return trigger.instant;
        }
        return triggerNextGet(trigger, new Date(), this.timezone);
    }

    private runTick(): void {
        try {
            this.runTickUnlocked();
        } catch (error) {
            logger.warn({ error }, "error: Timer tick failed");
            this.scheduleNextTick();
        }
    }

    private runTickUnlocked(): void {
        if (!this.isRunning()) {
            return;
        }

        const now = new Date();
        for (const job of Array.from(this.jobs.values())) {
            const due = job.nextRunTime;
            if (!due || now.getTime() < due.getTime()) {
                continue;
            }

            // Coalesce: everything missed up to now collapses into this one fire.
            job.nextRunTime = triggerNextGet(job.trigger, now, this.timezone);

            const lateMs = now.getTime() - due.getTime();
            if (lateMs > this.misfireGraceMs) {
                logger.warn(
                    { jobId: job.id, scheduledAt: due.toISOString(), lateMs },
                    "misfire: Run time was missed by more than the grace period"
                );
            } else if (job.runningInstances >= job.maxInstances) {
                logger.warn(
                    { jobId: job.id, runningInstances: job.runningInstances },
                    "skip: Maximum number of running instances reached"
                );
            } else {
                this.dispatch(job);
            }

            if (!job.nextRunTime) {
                this.jobs.delete(job.id);
                logger.debug({ jobId: job.id }, "event: Job finished firing and was removed");
            }
        }

        this.scheduleNextTick();
    }

    private dispatch(job: TimerJob): void {
        job.runningInstances += 1;
        const running = Promise.resolve()
            .then(() => job.run())
            .catch((error: unknown) => {
                logger.warn({ jobId: job.id, error }, "error: Job raised an exception");
            })
            .finally(() => {
                job.runningInstances -= 1;
                this.inFlight.delete(running);
            });
        this.inFlight.add(running);
    }

    private scheduleNextTick(): void {
        if (!this.isRunning()) {
            return;
        }
        if (this.tickTimer) {
            clearTimeout(this.tickTimer);
        }

        let nextDue: Date | null = null;
        for (const job of this.jobs.values()) {
            if (job.nextRunTime && (!nextDue || job.nextRunTime.getTime() < nextDue.getTime())) {
                nextDue = job.nextRunTime;
            }
        }

        const delay = nextDue ? nextDue.getTime() - Date.now() : TICK_MAX_MS;
        const waitMs = Math.max(0, Math.min(delay, TICK_MAX_MS));
        this.tickTimer = setTimeout(() => {
            this.tickTimer = null;
            this.runTick();
        }, waitMs);
        this.tickTimer.unref();
    }
}

function jobInfo(job: TimerJob): TimerJobInfo {
    return {
        id: job.id,
        trigger: job.trigger,
        nextRunTime: job.nextRunTime,
        runningInstances: job.runningInstances
    };
}
