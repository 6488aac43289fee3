export type * from "./types.js";

export { configLoad } from "./config/configLoad.js";
export { configResolve } from "./config/configResolve.js";
export { CLEANUP_JOB_ID, Scheduler } from "./engine/scheduler/scheduler.js";
export { PersistenceError, UnknownTaskError } from "./engine/scheduler/schedulerTypes.js";
export { TaskRegistryMemory } from "./engine/tasks/taskRegistryMemory.js";
export { TimerEngine } from "./engine/timer/timerEngine.js";
export { JobLookupError } from "./engine/timer/timerTypes.js";
export { triggerHumanReadable } from "./engine/triggers/ops/triggerHumanReadable.js";
export { triggerInfoGet } from "./engine/triggers/ops/triggerInfoGet.js";
export { triggerParse } from "./engine/triggers/ops/triggerParse.js";
export { ParseError } from "./engine/triggers/triggerTypes.js";
export { getLogger, initLogging } from "./log.js";
export { legacySchedulesImport } from "./storage/legacy/legacySchedulesImport.js";
export { Storage } from "./storage/storage.js";
export { storageOpen } from "./storage/storageOpen.js";
export { storageUpgrade } from "./storage/storageUpgrade.js";
