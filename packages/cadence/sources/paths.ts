import path from "node:path";

export const DEFAULT_DATA_DIR = path.join("data", "scheduler");
export const DEFAULT_SETTINGS_PATH = "cadence.settings.json";
export const DATABASE_DIR_NAME = "scheduler.pglite";
export const LEGACY_SCHEDULES_FILE_NAME = "scheduled_tasks.json";
