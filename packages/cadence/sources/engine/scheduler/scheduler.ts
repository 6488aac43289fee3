import { isValid, parseISO } from "date-fns";

import type { SchedulerConfig } from "@/types";
import { getLogger } from "../../log.js";
import type { ScheduleDbRecord, TaskRunDbRecord } from "../../storage/databaseTypes.js";
import type { Storage } from "../../storage/storage.js";
import { AsyncLock } from "../../util/lock.js";
import { TimerEngine } from "../timer/timerEngine.js";
import { JobLookupError } from "../timer/timerTypes.js";
import type { TaskExecutor, TaskRegistry } from "../tasks/taskTypes.js";
import { triggerHumanReadable } from "../triggers/ops/triggerHumanReadable.js";
import { triggerInfoGet } from "../triggers/ops/triggerInfoGet.js";
import { triggerParse } from "../triggers/ops/triggerParse.js";
import type { TriggerDescriptor } from "../triggers/triggerTypes.js";
import { schedulerJobIdBuild } from "./schedulerJobIdBuild.js";
import {
    PersistenceError,
    type ScheduleInfo,
    type SchedulerEvent,
    type SchedulerListener,
    type SchedulerOptions,
    type TaskRunOutcome,
    UnknownTaskError
} from "./schedulerTypes.js";

const logger = getLogger("scheduler.engine");

export const CLEANUP_JOB_ID = "cleanup_task";
const HISTORY_RUNS_PER_TASK = 5;

type JobRegistration = {
    jobId: string;
    nextRunTime: Date | null;
};

/**
 * Persistent trigger-driven scheduler.
 * Keeps one timer job per task, mirrors schedules into storage and the task registry,
 * and records every execution as a run row.
 */
export class Scheduler {
    private readonly storage: Storage;
    private readonly registry: TaskRegistry;
    private readonly execute: TaskExecutor;
    private readonly config: SchedulerConfig;
    private readonly timer: TimerEngine;
    private readonly lock = new AsyncLock();
    private scheduledTasks = new Map<string, string>();
    private runningTasks = new Set<string>();
    private listeners: SchedulerListener[] = [];
    private started = false;
    private stopped = false;

    constructor(options: SchedulerOptions) {
        this.storage = options.storage;
        this.registry = options.registry;
        this.execute = options.execute;
        this.config = options.config;
        this.timer = new TimerEngine({
            timezone: options.config.timezone,
            misfireGraceMs: options.config.misfireGraceMs,
            maxInstances: options.config.maxInstances
        });
    }

    /**
     * Reloads persisted schedules, starts the timer and registers the daily run-history cleanup.
     */
    async start(): Promise<void> {
        if (this.started || this.stopped) {
            return;
        }
        this.started = true;

        await this.schedulesLoad();
        this.timer.start();
        this.timer.addJob({
            id: CLEANUP_JOB_ID,
            trigger: {
                kind: "cron",
                minute: "0",
                hour: String(this.config.cleanupHour),
                dayOfMonth: "*",
                month: "*",
                dayOfWeek: "*"
            },
            run: () => this.cleanupRun(),
            replaceExisting: true,
            maxInstances: 1
        });
        logger.info(
            { scheduled: this.scheduledTasks.size, timezone: this.config.timezone },
            "start: Scheduler started"
        );
    }

    /** Stops firing. Runs already in progress finish on their own; see drain(). */
    async shutdown(): Promise<void> {
        if (this.stopped) {
            return;
        }
        this.stopped = true;
        this.timer.shutdown();
        logger.info({ running: this.runningTasks.size }, "stop: Scheduler stopped");
    }

    drain(): Promise<void> {
        return this.timer.drain();
    }

    /**
     * Schedules a task, replacing any schedule it already has.
     * Returns: false when the task is unknown, the spec does not parse, or registration fails.
     */
    async scheduleTask(taskId: string, spec: string, startTime?: Date): Promise<boolean> {
        if (!this.registry.exists(taskId)) {
            logger.error({ taskId, error: new UnknownTaskError(taskId) }, "error: Cannot schedule unknown task");
            return false;
        }

        const parsed = triggerParse(spec, { startTime });
        if (!parsed.ok) {
            logger.error({ taskId, spec, error: parsed.error }, "error: Invalid schedule");
            return false;
        }

        const trigger = parsed.trigger;
        const humanReadable = triggerHumanReadable(spec);
        const registration = await this.lock.inLock(() => this.jobRegister(taskId, spec, trigger, humanReadable));
        if (!registration) {
            return false;
        }

        logger.info(
            { taskId, jobId: registration.jobId, nextRunTime: registration.nextRunTime?.toISOString() ?? null },
            "schedule: Task scheduled"
        );
        this.notifyListeners({
            type: "schedule_update",
            task_id: taskId,
            schedule: {
                job_id: registration.jobId,
                schedule_type: trigger.kind,
                schedule_value: spec,
                human_readable: humanReadable,
                next_run_time: registration.nextRunTime?.toISOString() ?? null
            }
        });
        return true;
    }

    /**
     * Removes the task's timer job and persisted schedule.
     * Returns: false when the task has no schedule.
     */
    async cancelTask(taskId: string): Promise<boolean> {
        const cancelled = await this.lock.inLock(async () => {
            const jobId = this.scheduledTasks.get(taskId);
            if (!jobId) {
                return false;
            }

            this.jobRemove(jobId);
            this.scheduledTasks.delete(taskId);
            await this.scheduleUnpersist(taskId);

            const record = this.registry.get(taskId);
            if (record) {
                record.schedule = null;
                record.nextRunTime = null;
            }
            return true;
        });

        if (!cancelled) {
            logger.warn({ taskId }, "cancel: Task is not scheduled");
            return false;
        }

        logger.info({ taskId }, "cancel: Task schedule removed");
        this.notifyListeners({ type: "schedule_removed", task_id: taskId });
        return true;
    }

    /**
     * Returns: null when the task is not tracked, its job already finished, or its row is missing.
     */
    async getTaskSchedule(taskId: string): Promise<ScheduleInfo | null> {
        const jobId = this.scheduledTasks.get(taskId);
        if (!jobId) {
            return null;
        }
        const job = this.timer.getJob(jobId);
        if (!job) {
            return null;
        }

        let row: ScheduleDbRecord | null;
        try {
            row = await this.storage.schedules.findByTaskId(taskId);
        } catch (error) {
            logger.warn(
                { taskId, error: new PersistenceError("findByTaskId", taskId, error) },
                "error: Failed to read persisted schedule"
            );
            return null;
        }
        if (!row) {
            return null;
        }
        return {
            taskId,
            jobId,
            nextRunTime: job.nextRunTime,
            trigger: triggerInfoGet(job.trigger),
            scheduleType: row.scheduleType,
            scheduleValue: row.scheduleValue,
            humanReadable: triggerHumanReadable(row.scheduleValue)
        };
    }

    async getAllSchedules(): Promise<Record<string, ScheduleInfo>> {
        const schedules: Record<string, ScheduleInfo> = {};
        for (const taskId of Array.from(this.scheduledTasks.keys())) {
            const info = await this.getTaskSchedule(taskId);
            if (info) {
                schedules[taskId] = info;
            }
        }
        return schedules;
    }

    /** Schedules that will fire again, soonest first. */
    async getUpcomingSchedules(limit = 10): Promise<ScheduleInfo[]> {
        const schedules = Object.values(await this.getAllSchedules());
        return schedules
            .filter((schedule): schedule is ScheduleInfo & { nextRunTime: Date } => schedule.nextRunTime !== null)
            .sort((a, b) => a.nextRunTime.getTime() - b.nextRunTime.getTime())
            .slice(0, Math.max(0, limit));
    }

    getTaskRuns(taskId: string, limit = 10): Promise<TaskRunDbRecord[]> {
        return this.storage.taskRuns.findRecent(taskId, limit);
    }

    /** Latest runs across every scheduled task, newest first. */
    getExecutionHistory(limit = 20): Promise<TaskRunDbRecord[]> {
        return this.storage.taskRuns.findRecentForTasks(
            Array.from(this.scheduledTasks.keys()),
            HISTORY_RUNS_PER_TASK,
            limit
        );
    }

    isScheduled(taskId: string): boolean {
        return this.scheduledTasks.has(taskId);
    }

    isRunning(taskId: string): boolean {
        return this.runningTasks.has(taskId);
    }

    addListener(listener: SchedulerListener): void {
        this.listeners.push(listener);
    }

    removeListener(listener: SchedulerListener): void {
        this.listeners = this.listeners.filter((entry) => entry !== listener);
    }

    notifyListeners(event: SchedulerEvent): void {
        for (const listener of [...this.listeners]) {
            try {
                const result = listener(event);
                if (result instanceof Promise) {
                    result.catch((error: unknown) => {
                        logger.warn({ eventType: event.type, error }, "error: Scheduler listener rejected");
                    });
                }
            } catch (error) {
                logger.warn({ eventType: event.type, error }, "error: Scheduler listener failed");
            }
        }
    }

    private async jobRegister(
        taskId: string,
        spec: string,
        trigger: TriggerDescriptor,
        humanReadable: string
    ): Promise<JobRegistration | null> {
        const previousJobId = this.scheduledTasks.get(taskId);
        const jobId = schedulerJobIdBuild(taskId);
        let added = false;
        try {
            if (previousJobId) {
                this.jobRemove(previousJobId);
            }
            const job = this.timer.addJob({ id: jobId, trigger, run: () => this.onFire(taskId) });
            added = true;
            this.scheduledTasks.set(taskId, jobId);

            const record = this.registry.get(taskId);
            if (!record) {
                throw new UnknownTaskError(taskId);
            }
            record.schedule = humanReadable;
            record.nextRunTime = this.nextRunTimeLive(job.nextRunTime);

            await this.schedulePersist(taskId, jobId, trigger, spec, job.nextRunTime);
            return { jobId, nextRunTime: job.nextRunTime };
        } catch (error) {
            logger.error({ taskId, jobId, error }, "error: Failed to register schedule, rolling back");
            if (added) {
                this.jobRemove(jobId);
            }
            // Any previous job was already removed, so no row may outlive it.
            this.scheduledTasks.delete(taskId);
            await this.scheduleUnpersist(taskId);
            return null;
        }
    }

    /** One-shots already past the misfire grace are dropped by the timer without firing. */
    private nextRunTimeLive(nextRunTime: Date | null): Date | null {
        if (nextRunTime && nextRunTime.getTime() < Date.now() - this.config.misfireGraceMs) {
            return null;
        }
        return nextRunTime;
    }

    private async scheduleUnpersist(taskId: string): Promise<void> {
        try {
            await this.storage.schedules.delete(taskId);
        } catch (error) {
            logger.error(
                { taskId, error: new PersistenceError("delete", taskId, error) },
                "error: Failed to delete persisted schedule"
            );
        }
    }

    private async schedulePersist(
        taskId: string,
        jobId: string,
        trigger: TriggerDescriptor,
        spec: string,
        nextRunTime: Date | null
    ): Promise<void> {
        try {
            await this.storage.schedules.save({
                taskId,
                jobId,
                scheduleType: trigger.kind,
                scheduleValue: spec,
                nextRunTime: nextRunTime?.getTime() ?? null
            });
        } catch (error) {
            // Degraded mode: the schedule keeps running in memory.
            logger.error(
                { taskId, jobId, error: new PersistenceError("save", taskId, error) },
                "error: Failed to persist schedule"
            );
        }
    }

    private jobRemove(jobId: string): void {
        try {
            this.timer.removeJob(jobId);
        } catch (error) {
            if (!(error instanceof JobLookupError)) {
                throw error;
            }
            logger.warn({ jobId }, "cancel: Timer job was already gone");
        }
    }

    private async onFire(taskId: string): Promise<void> {
        const claimed = await this.lock.inLock(() => {
            if (!this.registry.exists(taskId)) {
                logger.error({ taskId, error: new UnknownTaskError(taskId) }, "error: Fired task is not registered");
                return false;
            }
            if (this.runningTasks.has(taskId)) {
                logger.warn({ taskId }, "skip: Task is already running");
                return false;
            }
            this.runningTasks.add(taskId);
            return true;
        });
        if (!claimed) {
            return;
        }

        const startTime = new Date();
        try {
            const runId = await this.runStartRecord(taskId, startTime);
            this.notifyListeners({ type: "task_started", task_id: taskId, start_time: startTime.toISOString() });
            const record = this.registry.get(taskId);
            if (record) {
                record.status = "pending";
                record.progress = 0;
                record.result = null;
                record.error = null;
            }

            try {
                await this.execute(taskId);
            } catch (error) {
                const endTime = new Date();
                const message = errorMessage(error);
                logger.error({ taskId, error }, "error: Task execution failed");
                await this.runCompleteRecord(runId, taskId, "failed", endTime, message);
                const current = this.registry.get(taskId);
                if (current) {
                    current.status = "failed";
                    current.error = message;
                }
                this.notifyListeners({
                    type: "task_error",
                    task_id: taskId,
                    error: message,
                    start_time: startTime.toISOString(),
                    end_time: endTime.toISOString()
                });
                return;
            }

            const endTime = new Date();
            const current = this.registry.get(taskId);
            const error = current?.error ?? null;
            const status: TaskRunOutcome = current?.status === "failed" || error ? "failed" : "completed";
            await this.runCompleteRecord(runId, taskId, status, endTime, error);
            logger.info({ taskId, status, durationMs: endTime.getTime() - startTime.getTime() }, "run: Task finished");
            this.notifyListeners({
                type: "task_finished",
                task_id: taskId,
                status,
                start_time: startTime.toISOString(),
                end_time: endTime.toISOString(),
                error
            });
        } finally {
            await this.lock.inLock(() => {
                this.runningTasks.delete(taskId);
                this.nextRunTimeMirror(taskId);
            });
        }
    }

    private async runStartRecord(taskId: string, startTime: Date): Promise<number | null> {
        try {
            return await this.storage.taskRuns.log({ taskId, status: "running", startTime: startTime.getTime() });
        } catch (error) {
            logger.error(
                { taskId, error: new PersistenceError("logTaskRun", taskId, error) },
                "error: Failed to record task start"
            );
            return null;
        }
    }

    private async runCompleteRecord(
        runId: number | null,
        taskId: string,
        status: TaskRunOutcome,
        endTime: Date,
        error: string | null
    ): Promise<void> {
        if (runId === null) {
            return;
        }
        try {
            await this.storage.taskRuns.complete(runId, { status, endTime: endTime.getTime(), error });
        } catch (failure) {
            logger.error(
                { taskId, runId, error: new PersistenceError("logTaskRun", taskId, failure) },
                "error: Failed to record task completion"
            );
        }
    }

    private nextRunTimeMirror(taskId: string): void {
        const record = this.registry.get(taskId);
        if (!record) {
            return;
        }
        const jobId = this.scheduledTasks.get(taskId);
        const job = jobId ? this.timer.getJob(jobId) : null;
        record.nextRunTime = job?.nextRunTime ?? null;
    }

    private async cleanupRun(): Promise<void> {
        try {
            await this.storage.cleanupOldRuns(this.config.retentionDays);
        } catch (error) {
            logger.error({ error: new PersistenceError("cleanup", null, error) }, "error: Run history cleanup failed");
        }
    }

    private async schedulesLoad(): Promise<void> {
        let rows: ScheduleDbRecord[];
        try {
            rows = await this.storage.schedules.findAll();
        } catch (error) {
            logger.error(
                { error: new PersistenceError("load", null, error) },
                "error: Failed to load persisted schedules"
            );
            return;
        }

        const now = Date.now();
        let loaded = 0;
        for (const row of rows) {
            if (!this.registry.exists(row.taskId)) {
                logger.warn({ taskId: row.taskId }, "load: Skipping schedule for unknown task");
                continue;
            }
            if (row.scheduleType === "date" && row.scheduleValue.startsWith("at:")) {
                const instant = parseISO(row.scheduleValue.slice("at:".length).trim());
                if (isValid(instant) && instant.getTime() <= now) {
                    logger.warn(
                        { taskId: row.taskId, scheduleValue: row.scheduleValue },
                        "load: Skipping one-time schedule in the past"
                    );
                    continue;
                }
            }
            if (await this.scheduleTask(row.taskId, row.scheduleValue)) {
                loaded += 1;
            }
        }
        logger.info({ loaded, total: rows.length }, "load: Persisted schedules loaded");
    }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
