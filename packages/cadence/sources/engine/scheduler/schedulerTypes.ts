import type { SchedulerConfig } from "@/types";
import type { Storage } from "../../storage/storage.js";
import type { TaskExecutor, TaskRegistry } from "../tasks/taskTypes.js";
import type { ScheduleType, TriggerInfo } from "../triggers/triggerTypes.js";

export type SchedulerOptions = {
    storage: Storage;
    registry: TaskRegistry;
    execute: TaskExecutor;
    config: SchedulerConfig;
};

/**
 * Combined view of a live job and its persisted row.
 */
export type ScheduleInfo = {
    taskId: string;
    jobId: string;
    nextRunTime: Date | null;
    trigger: TriggerInfo;
    scheduleType: ScheduleType;
    scheduleValue: string;
    humanReadable: string;
};

export type ScheduleEventPayload = {
    job_id: string;
    schedule_type: ScheduleType;
    schedule_value: string;
    human_readable: string;
    next_run_time: string | null;
};

export type TaskRunOutcome = "completed" | "failed";

// Keys are snake_case: listeners forward these objects as-is.
export type SchedulerEvent =
    | { type: "schedule_update"; task_id: string; schedule: ScheduleEventPayload }
    | { type: "schedule_removed"; task_id: string }
    | { type: "task_started"; task_id: string; start_time: string }
    | {
          type: "task_finished";
          task_id: string;
          status: TaskRunOutcome;
          start_time: string;
          end_time: string;
          error: string | null;
      }
    | { type: "task_error"; task_id: string; error: string; start_time: string; end_time: string };

export type SchedulerListener = (event: SchedulerEvent) => void | Promise<void>;

export class UnknownTaskError extends Error {
    readonly taskId: string;

    constructor(taskId: string) {
        super(`Task not found: ${taskId}`);
        this.name = "UnknownTaskError";
        this.taskId = taskId;
    }
}

/**
 * Storage failure during a scheduler operation. The in-memory state stays authoritative.
 */
export class PersistenceError extends Error {
    readonly operation: string;
    readonly taskId: string | null;

    constructor(operation: string, taskId: string | null, cause: unknown) {
        super(`Persistence failed during ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`, {
            cause
        });
        this.name = "PersistenceError";
        this.operation = operation;
        this.taskId = taskId;
    }
}
