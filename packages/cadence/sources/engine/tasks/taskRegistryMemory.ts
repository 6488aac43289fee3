import type { TaskRecord, TaskRegistry } from "./taskTypes.js";

/**
 * Process-local task registry backed by a Map.
 */
export class TaskRegistryMemory implements TaskRegistry {
    private readonly tasks = new Map<string, TaskRecord>();

    /** Adds a task in pending state; an existing record is returned unchanged. */
    create(taskId: string): TaskRecord {
        const existing = this.tasks.get(taskId);
        if (existing) {
            return existing;
        }
        const record: TaskRecord = {
            taskId,
            status: "pending",
            progress: 0,
            result: null,
            error: null,
            schedule: null,
            nextRunTime: null
        };
        this.tasks.set(taskId, record);
        return record;
    }

    exists(taskId: string): boolean {
        return this.tasks.has(taskId);
    }

    get(taskId: string): TaskRecord | null {
        return this.tasks.get(taskId) ?? null;
    }

    list(): TaskRecord[] {
        return Array.from(this.tasks.values());
    }

    delete(taskId: string): boolean {
        return this.tasks.delete(taskId);
    }
}
