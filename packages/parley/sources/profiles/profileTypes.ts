import type { ModelSelector } from "../providers/providerTypes.js";

export type Profile = {
    name: string;
    model: ModelSelector;
    greeting: string;
    systemPrompt: string;
};
