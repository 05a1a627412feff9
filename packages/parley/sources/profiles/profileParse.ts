import { modelSelectorParse } from "../providers/modelSelectorParse.js";
import { ProfileError } from "./profileError.js";
import type { Profile } from "./profileTypes.js";

/**
 * Parses profile text: line 1 model, line 2 greeting, remaining lines system prompt.
 * Expects: at least three lines and a recognised model name.
 */
export function profileParse(name: string, content: string): Profile {
    const lines = content.replace(/\r\n/g, "\n").split("\n");
    if (lines.length < 3) {
        throw new ProfileError(name, `Profile "${name}" needs a model, a greeting and a system prompt.`);
    }
    const [modelLine = "", greetingLine = "", ...promptLines] = lines;
    const model = modelSelectorParse(modelLine);
    if (!model) {
        throw new ProfileError(name, `Profile "${name}" names an unknown model: ${modelLine.trim()}`);
    }
    const systemPrompt = promptLines.join("\n").trim();
    if (!systemPrompt) {
        throw new ProfileError(name, `Profile "${name}" has an empty system prompt.`);
    }
    return {
        name,
        model,
        greeting: greetingLine.trim(),
        systemPrompt
    };
}
