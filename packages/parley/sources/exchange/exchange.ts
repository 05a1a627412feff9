import { createId } from "@paralleldrive/cuid2";

import type { ImagePayload, ProviderAdapter, ProviderId, ProviderReply, ProviderRequest, Session } from "@/types";
import { messageBuild } from "../conversation/messageBuild.js";
import type { ImageDedupPolicy } from "../images/imageDedupPolicy.js";
import { getLogger } from "../log.js";
import type { PluginCommandInfo, PluginPipeline } from "../plugins/pluginPipeline.js";
import type { PluginAi, PluginContextInput } from "../plugins/pluginTypes.js";
import { modelSelectorFormat } from "../providers/modelSelectorParse.js";
import { type ProviderFailure, providerFailureIs } from "../providers/providerErrors.js";
import { IMAGE_GENERATED_NOTE, responseFormatApply } from "../responses/responseFormatApply.js";
import { responseNormalize } from "../responses/responseNormalize.js";
import type { SessionStore } from "../sessions/sessionStore.js";
import { exchangeErrorReply } from "./exchangeErrorReply.js";
import type { ExchangeDelivery, ExchangeInput, ExchangeOptions, ExchangeResult } from "./exchangeTypes.js";

export type ExchangeProviders = {
    get(id: ProviderId): ProviderAdapter;
};

export type ExchangeDeps = {
    store: SessionStore;
    providers: ExchangeProviders;
    pipeline: PluginPipeline;
    ai: PluginAi;
    maxTokens: number;
    locked?: boolean;
    dedupPolicy?: ImageDedupPolicy;
};

type ProviderCall = { reply: ProviderReply; request: ProviderRequest } | { failure: ProviderFailure };

const logger = getLogger("exchange");

/**
 * Runs one user turn through the hooks, the selected provider, and back.
 * Expects: provider failures become reply text; only caller cancellation throws.
 */
export class Exchange {
    private readonly deps: ExchangeDeps;
    private readonly locked: boolean;

    constructor(deps: ExchangeDeps) {
        this.deps = deps;
        this.locked = deps.locked ?? false;
    }

    get store(): SessionStore {
        return this.deps.store;
    }

    send(chatId: string, input: ExchangeInput, options: ExchangeOptions = {}): Promise<ExchangeResult> {
        return this.deps.store.inLock(chatId, () => this.sendLocked(chatId, input, options));
    }

    /** Creates the session when missing, firing onSessionStart once. */
    open(chatId: string): Promise<Session> {
        return this.deps.store.inLock(chatId, () => this.sessionOpen(chatId));
    }

    listCommands(): PluginCommandInfo[] {
        return this.deps.pipeline.listCommands(this.locked);
    }

    /**
     * Runs a custom command with delivery capabilities in its context.
     * Returns true when handled, false when unknown or unavailable, null when it failed.
     */
    runCommand(chatId: string, name: string, delivery: ExchangeDelivery): Promise<boolean | null> {
        return this.deps.store.inLock(chatId, async () => {
            const session = await this.sessionOpen(chatId);
            return this.deps.pipeline.runCommand(name, chatId, {
                ...this.contextInput(session),
                sendMessage: (text) => delivery.sendText(chatId, text),
                sendPhoto: (data, mimeType, caption) => delivery.sendPhoto(chatId, data, mimeType, caption),
                sendDocument: (data, filename, caption) => delivery.sendDocument(chatId, data, filename, caption)
            });
        });
    }

    private async sendLocked(chatId: string, input: ExchangeInput, options: ExchangeOptions): Promise<ExchangeResult> {
        const exchangeId = createId();
        const { store, pipeline } = this.deps;
        const session = await this.sessionOpen(chatId);
        logger.debug(`start: Exchange started exchangeId=${exchangeId} chatId=${chatId} model=${session.model.modelId}`);

        let userText = await pipeline.runText("preUserText", input.text, this.contextInput(session));
        userText = await pipeline.runText("postUserText", userText, this.contextInput(session));
        let userImages = await pipeline.runImages("preUserImages", input.images ?? [], userText, this.contextInput(session));
        userImages = await pipeline.runImages("postUserImages", userImages, userText, this.contextInput(session));

        session.conversation.push(messageBuild("user", userText, userImages));
        store.trim(chatId);

        const call = await this.providerCall(session, options.signal);
        if ("failure" in call) {
            const { text, error } = exchangeErrorReply(call.failure);
            logger.warn(
                { error: call.failure, exchangeId, provider: session.model.provider },
                `event: Provider call failed kind=${error.kind}`
            );
            await pipeline.runLifecycle("onMessageComplete", chatId, this.contextInput(session));
            return {
                exchangeId,
                text,
                images: [],
                usage: 0,
                totalTokens: session.tokensUsed,
                notes: [],
                error
            };
        }

        const normalized = responseNormalize(call.reply, this.deps.dedupPolicy);

        let assistantText = await pipeline.runText("preAssistantText", normalized.text, this.contextInput(session));
        assistantText = await pipeline.runText("postAssistantText", assistantText, this.contextInput(session));
        let assistantImages: ImagePayload[] = await pipeline.runImages(
            "preAssistantImages",
            normalized.images,
            assistantText,
            this.contextInput(session)
        );
        assistantImages = await pipeline.runImages(
            "postAssistantImages",
            assistantImages,
            assistantText,
            this.contextInput(session)
        );

        // Only text is kept in history; generated images are delivered, not replayed.
        const storedText = !assistantText.trim() && assistantImages.length > 0 ? IMAGE_GENERATED_NOTE : assistantText;
        session.conversation.push(messageBuild("assistant", storedText));
        store.trim(chatId);
        store.addTokens(chatId, call.reply.usage);

        const formatted = responseFormatApply({ text: assistantText, images: assistantImages }, session.responseFormat);
        const notes = call.request.notes;
        const text = [formatted.text, ...notes].filter((part) => part.length > 0).join("\n\n");

        await pipeline.runLifecycle("onMessageComplete", chatId, this.contextInput(session));
        logger.debug(
            `end: Exchange completed exchangeId=${exchangeId} tokens=${call.reply.usage} images=${formatted.images.length}`
        );

        return {
            exchangeId,
            text,
            images: formatted.images,
            usage: call.reply.usage,
            totalTokens: session.tokensUsed,
            notes,
            error: null
        };
    }

    private async providerCall(session: Session, signal?: AbortSignal): Promise<ProviderCall> {
        const adapter = this.deps.providers.get(session.model.provider);
        try {
            const request = await adapter.buildRequest(session.conversation, session.model.modelId, this.deps.maxTokens, {
                imageOutput: session.imageOutput,
                signal
            });
            const wire = await adapter.execute(request, signal);
            const reply = adapter.parseResponse(wire);
            if (reply instanceof Error) {
                return { failure: reply };
            }
            return { reply, request };
        } catch (error) {
            if (providerFailureIs(error)) {
                return { failure: error };
            }
            throw error;
        }
    }

    private async sessionOpen(chatId: string): Promise<Session> {
        const session = this.deps.store.get(chatId);
        if (this.deps.store.markStarted(chatId)) {
            await this.deps.pipeline.runLifecycle("onSessionStart", chatId, this.contextInput(session));
        }
        return session;
    }

    private contextInput(session: Session): PluginContextInput {
        const snapshot = this.deps.store.snapshot(session.id);
        return {
            chatId: session.id,
            session: snapshot,
            history: snapshot.conversation,
            metadata: session.pluginMetadata,
            ai: this.deps.ai,
            model: modelSelectorFormat(session.model),
            locked: this.locked
        };
    }
}
