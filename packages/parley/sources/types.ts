// Central type re-exports for cross-cutting concerns.
// Import via: import type { ... } from "@/types";

// Config
export type { Config, ConfigOverrides } from "./config/configTypes.js";
// Conversation
export type {
    ContentPart,
    ImagePart,
    ImagePayload,
    ImageUrlPart,
    Message,
    MessageRole,
    TextPart
} from "./conversation/conversationTypes.js";
// Exchange
export type {
    ExchangeDelivery,
    ExchangeError,
    ExchangeInput,
    ExchangeOptions,
    ExchangeResult
} from "./exchange/exchangeTypes.js";
// Plugins
export type {
    ConversationPlugin,
    HookName,
    PluginAi,
    PluginAiRequest,
    PluginApi,
    PluginCommand,
    PluginContext,
    PluginModule
} from "./plugins/pluginTypes.js";
// Profiles
export type { Profile } from "./profiles/profileTypes.js";
// Providers
export type { CatalogModel, ModelCatalog } from "./providers/modelCatalogTypes.js";
export type {
    ImageCandidate,
    ModelSelector,
    ProviderAdapter,
    ProviderAdapterOptions,
    ProviderReply,
    ProviderRequest
} from "./providers/providerTypes.js";
// Responses
export type { NormalizedResponse } from "./responses/responseTypes.js";
// Sessions
export type { Session, SessionSnapshot } from "./sessions/sessionTypes.js";
// Settings
export type { ImageOutput, ProviderId, ResponseFormat, SettingsConfig } from "./settings.js";
