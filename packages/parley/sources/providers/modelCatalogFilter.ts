import type { CatalogModel } from "./modelCatalogTypes.js";

export type ModelCatalogFilterOptions = {
    caseSensitive?: boolean;
};

/**
 * Keeps models whose id or name contains the query. An empty query keeps all.
 */
export function modelCatalogFilter(
    models: readonly CatalogModel[],
    query: string,
    options: ModelCatalogFilterOptions = {}
): CatalogModel[] {
    const trimmed = query.trim();
    if (!trimmed) {
        return [...models];
    }
    const normalize = options.caseSensitive ? (value: string) => value : (value: string) => value.toLowerCase();
    const needle = normalize(trimmed);
    return models.filter((model) => normalize(model.id).includes(needle) || normalize(model.name).includes(needle));
}
