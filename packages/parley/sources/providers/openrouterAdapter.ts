import type { Message } from "../conversation/conversationTypes.js";
import type { ImageOutput, ProviderId } from "../settings.js";
import { chatMessageEncode } from "./chatMessageEncode.js";
import type { ModelCatalog } from "./modelCatalogTypes.js";
import { OpenAiAdapter } from "./openaiAdapter.js";
import type { ProviderAdapterOptions, ProviderBuildOptions, ProviderRequest } from "./providerTypes.js";

export type OpenRouterAdapterOptions = ProviderAdapterOptions & {
    appName?: string;
    appUrl?: string | null;
    catalog?: ModelCatalog;
};

type Modality = "image" | "text";

/**
 * OpenRouter chat completions with optional image output.
 * Expects: modelId is the wire id without the `openrouter:` namespace.
 */
export class OpenRouterAdapter extends OpenAiAdapter {
    readonly id: ProviderId = "openrouter";
    private readonly appName: string | null;
    private readonly appUrl: string | null;
    private readonly catalog: ModelCatalog | null;

    constructor(options: OpenRouterAdapterOptions) {
        super(options);
        this.appName = options.appName ?? null;
        this.appUrl = options.appUrl ?? null;
        this.catalog = options.catalog ?? null;
    }

    async buildRequest(
        conversation: readonly Message[],
        modelId: string,
        maxTokens: number,
        options: ProviderBuildOptions = {}
    ): Promise<ProviderRequest> {
        const body: Record<string, unknown> = {
            model: modelId,
            max_tokens: maxTokens,
            messages: conversation.map(chatMessageEncode)
        };

        const imageOutput = options.imageOutput;
        const modalities = imageOutput ? await this.modalitiesResolve(modelId, imageOutput) : null;
        if (modalities) {
            body.modalities = modalities;
        }
        if (imageOutput && modalities?.includes("image")) {
            const imageConfig: Record<string, string> = {};
            if (imageOutput.aspectRatio) {
                imageConfig.aspect_ratio = imageOutput.aspectRatio;
            }
            if (imageOutput.imageSize) {
                imageConfig.image_size = imageOutput.imageSize;
            }
            if (Object.keys(imageConfig).length > 0) {
                body.image_config = imageConfig;
            }
        }

        return {
            url: `${this.options.baseUrl}/chat/completions`,
            headers: this.headersBuild(),
            body,
            notes: []
        };
    }

    protected headersBuild(): Record<string, string> {
        const headers = super.headersBuild();
        if (this.appUrl) {
            headers["HTTP-Referer"] = this.appUrl;
        }
        if (this.appName) {
            headers["X-Title"] = this.appName;
        }
        return headers;
    }

    private async modalitiesResolve(modelId: string, imageOutput: ImageOutput): Promise<Modality[] | null> {
        switch (imageOutput.modalities) {
            case "text+image":
                return ["image", "text"];
            case "image":
                return ["image"];
            case "text":
                return ["text"];
            case "auto": {
                if (!this.catalog) {
                    return null;
                }
                const supported = await this.catalog.supportsImageOutput(modelId);
                return supported ? ["image", "text"] : null;
            }
        }
    }
}
