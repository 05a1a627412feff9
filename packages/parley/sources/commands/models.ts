import path from "node:path";

import { configLoad } from "../config/configLoad.js";
import { modelCatalogFilter } from "../providers/modelCatalogFilter.js";
import { OpenRouterCatalog } from "../providers/openrouterCatalog.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";

export type ModelsCommandOptions = {
    settings?: string;
    caseSensitive?: boolean;
};

/**
 * CLI command listing catalog models, optionally filtered by a substring of id or name.
 */
export async function modelsCommand(query: string | undefined, options: ModelsCommandOptions): Promise<void> {
    const settingsPath = path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH);
    const config = await configLoad(settingsPath);
    const openrouter = config.settings.providers.openrouter;
    const catalog = new OpenRouterCatalog({ baseUrl: openrouter.baseUrl, apiKey: openrouter.apiKey });

    const models = modelCatalogFilter(await catalog.list(), query ?? "", { caseSensitive: options.caseSensitive });
    if (models.length === 0) {
        console.log(query ? `No models match "${query}".` : "No models available.");
        return;
    }

    for (const model of models) {
        const modalities = model.outputModalities.join("+") || "text";
        console.log(`  ${model.id.padEnd(48)} ${modalities}`);
    }
    console.log(`\n${models.length} model(s)`);
}
