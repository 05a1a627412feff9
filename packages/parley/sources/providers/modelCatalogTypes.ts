export type CatalogModel = {
    id: string;
    name: string;
    contextLength: number | null;
    outputModalities: string[];
};

export interface ModelCatalog {
    list(signal?: AbortSignal): Promise<CatalogModel[]>;
    supportsImageOutput(modelId: string): Promise<boolean>;
}
