// Central type re-exports for cross-cutting concerns.
// Import via: import type { ... } from "@/types";

export type { Config, ConfigOverrides, SchedulerConfig, SettingsConfig } from "./config/configTypes.js";
export type {
    ScheduleEventPayload,
    ScheduleInfo,
    SchedulerEvent,
    SchedulerListener,
    SchedulerOptions,
    TaskRunOutcome
} from "./engine/scheduler/schedulerTypes.js";
export type { TaskExecutor, TaskRecord, TaskRegistry, TaskStatus } from "./engine/tasks/taskTypes.js";
export type { TimerJobInfo } from "./engine/timer/timerTypes.js";
export type { ScheduleType, TriggerDescriptor, TriggerInfo } from "./engine/triggers/triggerTypes.js";
export type { ScheduleDbRecord, TaskRunDbRecord, TaskRunStatus } from "./storage/databaseTypes.js";
