import type { ResolvedSettingsConfig } from "../settings.js";

export type Config = {
    settingsPath: string;
    configDir: string;
    settings: ResolvedSettingsConfig;
};

export type ConfigOverrides = {
    defaultModel?: string;
    env?: NodeJS.ProcessEnv;
};
