import type { Message } from "../conversation/conversationTypes.js";
import type { ImageOutput, ProviderId } from "../settings.js";
import type { ProviderError, SchemaError } from "./providerErrors.js";

/**
 * Wire request ready for the network. `notes` carries remarks produced while
 * building it, such as dropped image input.
 */
export type ProviderRequest = {
    url: string;
    headers: Record<string, string>;
    body: Record<string, unknown>;
    notes: string[];
};

export type ImageCandidateSource = "side" | "content";

/**
 * Image reference found in a wire response, before decoding.
 * `source` records whether it came from a side array or the message content.
 */
export type ImageCandidate =
    | { source: ImageCandidateSource; kind: "dataUrl"; url: string }
    | { source: ImageCandidateSource; kind: "remote"; url: string }
    | { source: ImageCandidateSource; kind: "inline"; base64: string; mimeType: string };

export type ProviderReply = {
    text: string;
    images: ImageCandidate[];
    usage: number;
};

export type ProviderParseResult = ProviderReply | ProviderError | SchemaError;

export type ProviderBuildOptions = {
    imageOutput?: ImageOutput;
    signal?: AbortSignal;
};

export interface ProviderAdapter {
    readonly id: ProviderId;
    buildRequest(
        conversation: readonly Message[],
        modelId: string,
        maxTokens: number,
        options?: ProviderBuildOptions
    ): Promise<ProviderRequest>;
    parseResponse(wire: unknown): ProviderParseResult;
    execute(request: ProviderRequest, signal?: AbortSignal): Promise<unknown>;
}

export type ProviderAdapterOptions = {
    baseUrl: string;
    apiKey: string | null;
    timeoutMs?: number;
    retries?: number;
    fetchImpl?: typeof fetch;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export type ModelSelector = {
    provider: ProviderId;
    modelId: string;
};
