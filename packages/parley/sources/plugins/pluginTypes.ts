import type { Logger } from "pino";

import type { ImagePayload, Message } from "../conversation/conversationTypes.js";
import type { SessionSnapshot } from "../sessions/sessionTypes.js";

type Awaitable<T> = T | Promise<T>;

export type PluginAiRequest = {
    prompt: string;
    model?: string;
    maxTokens?: number;
    images?: ImagePayload[];
};

/**
 * Model access for hooks, routed through OpenRouter.
 */
export type PluginAi = {
    callAi: (request: PluginAiRequest) => Promise<string>;
    quickCall: (system: string, user: string, model?: string) => Promise<string>;
};

export type PluginContext = {
    chatId: string;
    session: SessionSnapshot;
    history: readonly Message[];
    /** Per-session storage; writes persist once the call finishes in time. */
    metadata: Record<string, unknown>;
    ai: PluginAi;
    model: string;
    locked: boolean;
    signal: AbortSignal;
    logger: Logger;
    sendMessage?: (text: string) => Promise<void>;
    sendPhoto?: (data: Buffer, mimeType: string, caption?: string) => Promise<void>;
    sendDocument?: (data: Buffer, filename: string, caption?: string) => Promise<void>;
};

/** Context fields supplied by the caller; the pipeline adds the deadline signal and logger. */
export type PluginContextInput = Omit<PluginContext, "signal" | "logger">;

export type TextHook = (text: string, ctx: PluginContext) => Awaitable<string>;
export type ImageHook = (images: ImagePayload[], text: string, ctx: PluginContext) => Awaitable<ImagePayload[]>;
export type LifecycleHook = (chatId: string, ctx: PluginContext) => Awaitable<void>;
export type CommandHandler = (chatId: string, ctx: PluginContext) => Awaitable<void>;

export type PluginCommand = {
    description: string;
    handler: CommandHandler;
    availableWhenLocked?: boolean;
};

export type ConversationPlugin = {
    preUserText: TextHook;
    postUserText: TextHook;
    preUserImages: ImageHook;
    postUserImages: ImageHook;
    preAssistantText: TextHook;
    postAssistantText: TextHook;
    preAssistantImages: ImageHook;
    postAssistantImages: ImageHook;
    onSessionStart: LifecycleHook;
    onMessageComplete: LifecycleHook;
    getCommands?: () => Record<string, PluginCommand>;
};

export type TextHookName = "preUserText" | "postUserText" | "preAssistantText" | "postAssistantText";
export type ImageHookName = "preUserImages" | "postUserImages" | "preAssistantImages" | "postAssistantImages";
export type LifecycleHookName = "onSessionStart" | "onMessageComplete";
export type HookName = TextHookName | ImageHookName | LifecycleHookName;

export const HOOK_NAMES: readonly HookName[] = [
    "preUserText",
    "postUserText",
    "preUserImages",
    "postUserImages",
    "preAssistantText",
    "postAssistantText",
    "preAssistantImages",
    "postAssistantImages",
    "onSessionStart",
    "onMessageComplete"
];

export type PluginApi = {
    logger: Logger;
    ai: PluginAi;
};

export type PluginModule = {
    name: string;
    create: (api: PluginApi) => Awaitable<ConversationPlugin>;
};

export function definePlugin(module: PluginModule): PluginModule {
    return module;
}
