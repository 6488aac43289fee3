export type TaskStatus = "pending" | "running" | "completed" | "failed" | "cancelled";

/**
 * Live task state shared between the scheduler and the executor.
 * The scheduler mirrors `schedule` and `nextRunTime`; the executor owns the rest.
 */
export type TaskRecord = {
    taskId: string;
    status: TaskStatus;
    progress: number;
    result: unknown;
    error: string | null;
    /** Human readable schedule, e.g. "every 30 minutes". */
    schedule: string | null;
    nextRunTime: Date | null;
};

export interface TaskRegistry {
    exists(taskId: string): boolean;
    get(taskId: string): TaskRecord | null;
}

/** Runs one task to completion; reports its outcome through the registry record. */
export type TaskExecutor = (taskId: string) => Promise<void>;
