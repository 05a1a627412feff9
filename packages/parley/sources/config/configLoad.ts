import { promises as fs } from "node:fs";
import path from "node:path";

import { DEFAULT_SETTINGS_PATH } from "../settings.js";
import { configResolve } from "./configResolve.js";
import { configSettingsParse } from "./configSettingsParse.js";
import type { Config, ConfigOverrides } from "./configTypes.js";

/**
 * Loads, validates, and resolves the settings file into a Config snapshot.
 * A missing file resolves to defaults.
 */
export async function configLoad(
    settingsPath: string = DEFAULT_SETTINGS_PATH,
    overrides: ConfigOverrides = {}
): Promise<Config> {
    const resolvedPath = path.resolve(settingsPath);
    let raw: unknown = {};

    try {
        const content = await fs.readFile(resolvedPath, "utf8");
        raw = JSON.parse(content);
    } catch (error) {
        if (!isMissingFile(error)) {
            throw error;
        }
    }

    const settings = configSettingsParse(raw);
    return configResolve(settings, resolvedPath, overrides);
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}
