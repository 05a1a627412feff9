import type { ImagePayload } from "../conversation/conversationTypes.js";
import type { ProviderFailureKind } from "../providers/providerErrors.js";

export type ExchangeInput = {
    text: string;
    images?: ImagePayload[];
};

export type ExchangeOptions = {
    signal?: AbortSignal;
};

export type ExchangeError = {
    kind: ProviderFailureKind;
    message: string;
    type: string | null;
    code: string | null;
};

export type ExchangeResult = {
    exchangeId: string;
    text: string;
    images: ImagePayload[];
    /** Tokens reported for this exchange; 0 when the provider call failed. */
    usage: number;
    totalTokens: number;
    notes: string[];
    error: ExchangeError | null;
};

/**
 * Outbound channel to the chat, consumed by command handlers.
 */
export interface ExchangeDelivery {
    sendText(chatId: string, text: string): Promise<void>;
    sendPhoto(chatId: string, data: Buffer, mimeType: string, caption?: string): Promise<void>;
    sendDocument(chatId: string, data: Buffer, filename: string, caption?: string): Promise<void>;
}
