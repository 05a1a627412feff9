export { configLoad } from "./config/configLoad.js";
export { configResolve } from "./config/configResolve.js";
export { configSettingsParse } from "./config/configSettingsParse.js";
export { conversationTrim } from "./conversation/conversationTrim.js";
export { messageBuild, messageBuildSystem } from "./conversation/messageBuild.js";
export { messageTextExtract } from "./conversation/messageTextExtract.js";
export { Exchange } from "./exchange/exchange.js";
export { exchangeCreate, type ExchangeCreateOptions, type ExchangeRuntime } from "./exchange/exchangeCreate.js";
export { NETWORK_ERROR_REPLY, SCHEMA_ERROR_REPLY } from "./exchange/exchangeErrorReply.js";
export { type ImageDedupPolicy, imageDedupPolicyBuild } from "./images/imageDedupPolicy.js";
export { imageDeduplicate } from "./images/imageDeduplicate.js";
export { ImageProcessingError } from "./images/imageProcessingError.js";
export { getLogger, initLogging } from "./log.js";
export { PluginContractError, PluginFailure } from "./plugins/pluginErrors.js";
export { pluginLoad } from "./plugins/pluginLoad.js";
export { PluginPipeline } from "./plugins/pluginPipeline.js";
export { definePlugin } from "./plugins/pluginTypes.js";
export { ProfileError } from "./profiles/profileError.js";
export { profileList, profileLoad } from "./profiles/profileLoad.js";
export { profileParse } from "./profiles/profileParse.js";
export { AnthropicAdapter } from "./providers/anthropicAdapter.js";
export { GroqAdapter } from "./providers/groqAdapter.js";
export { modelCatalogFilter } from "./providers/modelCatalogFilter.js";
export { modelSelectorFormat, modelSelectorParse } from "./providers/modelSelectorParse.js";
export { OpenAiAdapter } from "./providers/openaiAdapter.js";
export { OpenRouterAdapter } from "./providers/openrouterAdapter.js";
export { OpenRouterCatalog } from "./providers/openrouterCatalog.js";
export { NetworkError, ProviderError, SchemaError } from "./providers/providerErrors.js";
export { ProviderRegistry } from "./providers/providerRegistry.js";
export { responseFormatApply } from "./responses/responseFormatApply.js";
export { responseNormalize } from "./responses/responseNormalize.js";
export { SessionStore } from "./sessions/sessionStore.js";
export type * from "./types.js";
