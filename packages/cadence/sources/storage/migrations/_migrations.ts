import { migration20260901AddSchedules } from "./20260901_add_schedules.js";
import { migration20260901AddTaskRuns } from "./20260901_add_task_runs.js";
import type { Migration } from "./migrationTypes.js";

export const migrations: Migration[] = [migration20260901AddSchedules, migration20260901AddTaskRuns];
