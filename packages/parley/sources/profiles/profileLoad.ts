import { promises as fs } from "node:fs";
import path from "node:path";

import { ProfileError } from "./profileError.js";
import { profileParse } from "./profileParse.js";
import type { Profile } from "./profileTypes.js";

export const PROFILE_EXTENSION = ".profile";

const PROFILE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export async function profileLoad(profilesDir: string, name: string): Promise<Profile> {
    const trimmed = name.trim();
    if (!PROFILE_NAME_PATTERN.test(trimmed)) {
        throw new ProfileError(trimmed, `Invalid profile name: ${trimmed}`);
    }
    const filePath = path.join(profilesDir, `${trimmed}${PROFILE_EXTENSION}`);
    let content: string;
    try {
        content = await fs.readFile(filePath, "utf8");
    } catch (error) {
        throw new ProfileError(trimmed, `Profile "${trimmed}" not found.`, { cause: error });
    }
    return profileParse(trimmed, content);
}

/**
 * Lists profile names in a directory, sorted. A missing directory has none.
 */
export async function profileList(profilesDir: string): Promise<string[]> {
    let entries: string[];
    try {
        entries = await fs.readdir(profilesDir);
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            return [];
        }
        throw error;
    }
    return entries
        .filter((entry) => entry.endsWith(PROFILE_EXTENSION))
        .map((entry) => entry.slice(0, -PROFILE_EXTENSION.length))
        .filter((entry) => PROFILE_NAME_PATTERN.test(entry))
        .sort();
}
