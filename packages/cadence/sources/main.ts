import { readFileSync } from "node:fs";

import { Command, InvalidArgumentError } from "commander";

import { cleanupCommand } from "./commands/cleanup.js";
import { runsCommand } from "./commands/runs.js";
import { scheduleAddCommand } from "./commands/scheduleAdd.js";
import { scheduleRemoveCommand } from "./commands/scheduleRemove.js";
import { schedulesCommand } from "./commands/schedules.js";
import { startCommand } from "./commands/start.js";
import { upgradeCommand } from "./commands/upgrade.js";
import { initLogging } from "./log.js";
import { DEFAULT_SETTINGS_PATH } from "./paths.js";

const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
const version =
    typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
        ? pkg.version
        : "0.0.0";

const program = new Command();

initLogging();

program.name("cadence").description("Persistent trigger-driven task scheduler").version(version);

program
    .command("start")
    .description("Run the scheduler over the persisted schedules")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(startCommand);

program
    .command("schedules")
    .description("List persisted schedules")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(schedulesCommand);

program
    .command("schedule")
    .description("Store a schedule for a task (applied on next start)")
    .argument("<taskId>", "Task id")
    .argument("<spec>", 'Schedule spec, e.g. "every 30m" or "cron:0 9 * * 1-5"')
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(scheduleAddCommand);

program
    .command("unschedule")
    .description("Delete the persisted schedule of a task")
    .argument("<taskId>", "Task id")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(scheduleRemoveCommand);

program
    .command("runs")
    .description("Show recent runs of a task")
    .argument("<taskId>", "Task id")
    .option("-l, --limit <count>", "Number of runs to show", positiveIntParse)
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(runsCommand);

program
    .command("cleanup")
    .description("Delete run history older than the retention window")
    .option("-d, --days <days>", "Retention window in days", positiveIntParse)
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(cleanupCommand);

program
    .command("upgrade")
    .description("Apply pending storage migrations")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(upgradeCommand);

function positiveIntParse(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError("Expected a positive integer.");
    }
    return parsed;
}

if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
}

await program.parseAsync(process.argv);
