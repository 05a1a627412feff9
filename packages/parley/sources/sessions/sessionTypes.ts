import type { Message } from "../conversation/conversationTypes.js";
import type { ModelSelector } from "../providers/providerTypes.js";
import type { ImageOutput, ResponseFormat } from "../settings.js";

export type Session = {
    id: string;
    conversation: Message[];
    model: ModelSelector;
    tokensUsed: number;
    maxRounds: number;
    responseFormat: ResponseFormat;
    pluginMetadata: Record<string, unknown>;
    systemPrompt: string | null;
    profileName: string | null;
    imageOutput: ImageOutput;
    started: boolean;
    createdAt: number;
    updatedAt: number;
};

export type SessionSnapshot = Readonly<Omit<Session, "conversation" | "pluginMetadata">> & {
    readonly conversation: readonly Message[];
};

export type SessionDefaults = {
    model: ModelSelector;
    maxRounds: number;
    systemPrompt: string | null;
};
