import type { ScheduleType } from "../engine/triggers/triggerTypes.js";

export type TaskRunStatus = "running" | "completed" | "failed";

/**
 * Persisted schedule row. Timestamps are unix milliseconds.
 */
export type ScheduleDbRecord = {
    id: number;
    taskId: string;
    jobId: string;
    scheduleType: ScheduleType;
    scheduleValue: string;
    createdAt: number;
    nextRunTime: number | null;
};

export type ScheduleSaveInput = {
    taskId: string;
    jobId: string;
    scheduleType: ScheduleType;
    scheduleValue: string;
    nextRunTime?: number | null;
    createdAt?: number;
};

/**
 * One execution attempt. `endTime` and `error` stay null while running.
 */
export type TaskRunDbRecord = {
    id: number;
    taskId: string;
    status: TaskRunStatus;
    startTime: number;
    endTime: number | null;
    error: string | null;
};

export type TaskRunLogInput = {
    taskId: string;
    status: TaskRunStatus;
    startTime: number;
    endTime?: number | null;
    error?: string | null;
};

export type TaskRunCompleteInput = {
    status: Exclude<TaskRunStatus, "running">;
    endTime: number;
    error: string | null;
};
