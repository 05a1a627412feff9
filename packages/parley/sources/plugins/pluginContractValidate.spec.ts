import { describe, expect, it } from "vitest";

import { getLogger } from "../log.js";
import { pluginCommandsValidate, pluginContractValidate } from "./pluginContractValidate.js";
import { PluginContractError } from "./pluginErrors.js";
import { pluginPassThroughBuild } from "./pluginPassThroughBuild.js";
import { pluginTestContext } from "./pluginTestContext.js";
import type { PluginContext } from "./pluginTypes.js";

describe("pluginContractValidate", () => {
    it("accepts an object with all ten hooks", () => {
        const plugin = pluginContractValidate("ok", pluginPassThroughBuild());
        expect(typeof plugin.preUserText).toBe("function");
        expect(plugin.getCommands).toBeUndefined();
    });

    it("lists every missing hook", () => {
        const { preUserText: _pre, onMessageComplete: _done, ...partial } = pluginPassThroughBuild();
        try {
            pluginContractValidate("partial", { ...partial, postUserText: "not a function" });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(PluginContractError);
            expect(error instanceof PluginContractError ? [...error.missing].sort() : null).toEqual([
                "onMessageComplete",
                "postUserText",
                "preUserText"
            ]);
        }
    });

    it("rejects non-objects", () => {
        expect(() => pluginContractValidate("nothing", null)).toThrow(PluginContractError);
    });

    it("keeps `this` for class-based extensions", async () => {
        class Suffixer {
            private suffix = "?";
            preUserText(text: string) {
                return `${text}${this.suffix}`;
            }
            postUserText(text: string) {
                return text;
            }
            preUserImages<T>(images: T) {
                return images;
            }
            postUserImages<T>(images: T) {
                return images;
            }
            preAssistantText(text: string) {
                return text;
            }
            postAssistantText(text: string) {
                return text;
            }
            preAssistantImages<T>(images: T) {
                return images;
            }
            postAssistantImages<T>(images: T) {
                return images;
            }
            onSessionStart() {}
            onMessageComplete() {}
        }

        const plugin = pluginContractValidate("class", new Suffixer());
        const ctx: PluginContext = { ...pluginTestContext(), signal: new AbortController().signal, logger: getLogger("test") };
        expect(await plugin.preUserText("why", ctx)).toBe("why?");
    });
});

describe("pluginCommandsValidate", () => {
    it("accepts a command table", () => {
        const commands = pluginCommandsValidate({ stats: { description: "Show stats", handler: () => {} } });
        expect(Object.keys(commands ?? {})).toEqual(["stats"]);
    });

    it("rejects handlers that are not functions", () => {
        expect(pluginCommandsValidate({ stats: { description: "Show stats", handler: "nope" } })).toBeNull();
    });
});
