import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { getLogger } from "../log.js";
import { PluginContractError } from "./pluginErrors.js";
import { pluginLoad } from "./pluginLoad.js";
import { pluginTestContext } from "./pluginTestContext.js";

const tempRoots: string[] = [];

async function createTempDir(): Promise<string> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "parley-plugin-loader-"));
    tempRoots.push(dir);
    return dir;
}

const api = {
    logger: getLogger("test"),
    ai: pluginTestContext().ai
};

const hooks = `
  preUserText: (text) => text.trim(),
  postUserText: (text) => text,
  preUserImages: (images) => images,
  postUserImages: (images) => images,
  preAssistantText: (text) => text,
  postAssistantText: (text) => text,
  preAssistantImages: (images) => images,
  postAssistantImages: (images) => images,
  onSessionStart: () => {},
`;

describe("pluginLoad", () => {
    afterEach(async () => {
        const pending = tempRoots.splice(0, tempRoots.length);
        await Promise.all(pending.map((dir) => fs.rm(dir, { recursive: true, force: true })));
    });

    it("loads the plugin export and validates the created instance", async () => {
        const dir = await createTempDir();
        await fs.writeFile(
            path.join(dir, "trim.mjs"),
            `export const plugin = {
  name: "trim",
  create: () => ({${hooks}  onMessageComplete: () => {}
  })
};
`,
            "utf8"
        );

        const loaded = await pluginLoad("trim", api, dir);
        expect(loaded.name).toBe("trim");
        expect(await loaded.plugin.preUserText("  hi  ", { ...pluginTestContext(), signal: new AbortController().signal, logger: api.logger })).toBe("hi");
    });

    it("accepts a default export", async () => {
        const dir = await createTempDir();
        const entry = path.join(dir, "default.mjs");
        await fs.writeFile(
            entry,
            `export default { name: "fallback", create: async () => ({${hooks}  onMessageComplete: () => {} }) };\n`,
            "utf8"
        );

        await expect(pluginLoad(entry, api)).resolves.toMatchObject({ name: "fallback" });
    });

    it("rejects instances missing a hook", async () => {
        const dir = await createTempDir();
        await fs.writeFile(path.join(dir, "broken.mjs"), `export const plugin = { name: "broken", create: () => ({${hooks}}) };\n`, "utf8");

        await expect(pluginLoad("broken.mjs", api, dir)).rejects.toBeInstanceOf(PluginContractError);
    });

    it("fails for missing entries and modules without a plugin", async () => {
        const dir = await createTempDir();
        await fs.writeFile(path.join(dir, "empty.mjs"), "export const other = 1;\n", "utf8");

        await expect(pluginLoad("ghost", api, dir)).rejects.toThrow("Plugin entry not found: ghost");
        await expect(pluginLoad("empty.mjs", api, dir)).rejects.toThrow("Plugin module did not export a plugin");
    });
});
