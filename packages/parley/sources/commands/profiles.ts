import path from "node:path";

import { configLoad } from "../config/configLoad.js";
import { profileList } from "../profiles/profileLoad.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";

export type ProfilesCommandOptions = {
    settings?: string;
};

export async function profilesCommand(options: ProfilesCommandOptions): Promise<void> {
    const config = await configLoad(path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH));
    const names = await profileList(config.settings.profilesDir);
    if (names.length === 0) {
        console.log(`No profiles in ${config.settings.profilesDir}`);
        return;
    }
    for (const name of names) {
        console.log(`  ${name}`);
    }
}
