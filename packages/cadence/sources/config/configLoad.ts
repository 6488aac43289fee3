import { readFile } from "node:fs/promises";
import path from "node:path";

import { DEFAULT_SETTINGS_PATH } from "../paths.js";
import { configResolve } from "./configResolve.js";
import { configSettingsParse } from "./configSettingsParse.js";
import type { Config, ConfigOverrides } from "./configTypes.js";

/**
 * Reads the settings file, validates it and resolves the frozen Config.
 * A missing settings file means defaults plus environment; malformed JSON throws.
 */
export async function configLoad(
    settingsPath: string = DEFAULT_SETTINGS_PATH,
    overrides: ConfigOverrides = {}
): Promise<Config> {
    const resolvedPath = path.resolve(settingsPath);
    const settings = configSettingsParse(await settingsFileRead(resolvedPath));
    return configResolve(settings, resolvedPath, overrides);
}

async function settingsFileRead(filePath: string): Promise<unknown> {
    let content: string;
    try {
        content = await readFile(filePath, "utf8");
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            return {};
        }
        throw error;
    }
    return JSON.parse(content);
}
