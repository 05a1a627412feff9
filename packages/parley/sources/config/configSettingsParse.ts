import { z } from "zod";

import type { SettingsConfig } from "../settings.js";

const providerSettings = z
    .object({
        baseUrl: z.string().url().optional(),
        apiKey: z.string().min(1).optional(),
        timeoutMs: z.number().int().positive().optional(),
        retries: z.number().int().min(0).max(10).optional()
    })
    .strict();

const settingsSchema = z
    .object({
        defaultModel: z.string().min(1).optional(),
        maxRounds: z.number().int().positive().optional(),
        maxTokens: z.number().int().positive().optional(),
        systemPrompt: z.string().min(1).optional(),
        locked: z.boolean().optional(),
        appName: z.string().min(1).optional(),
        appUrl: z.string().url().optional(),
        profilesDir: z.string().min(1).optional(),
        providers: z
            .object({
                openai: providerSettings.optional(),
                anthropic: providerSettings.optional(),
                groq: providerSettings.optional(),
                openrouter: providerSettings.optional()
            })
            .strict()
            .optional(),
        plugins: z
            .object({
                enabled: z.boolean().optional(),
                entry: z.string().min(1).optional(),
                timeoutMs: z.number().int().positive().optional(),
                maxFailures: z.number().int().positive().optional(),
                helperModel: z.string().min(1).optional()
            })
            .strict()
            .optional(),
        images: z
            .object({
                nearDuplicateRatio: z.number().min(0).max(1).optional()
            })
            .strict()
            .optional()
    })
    .strict();

/**
 * Parses raw settings data into a validated SettingsConfig.
 * Expects: raw is JSON-compatible; throws ZodError on unknown keys or bad values.
 */
export function configSettingsParse(raw: unknown): SettingsConfig {
    return settingsSchema.parse(raw ?? {});
}
