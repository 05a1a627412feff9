import { promises as fs } from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";

import { z } from "zod";

import { getLogger } from "../log.js";
import { pluginContractValidate } from "./pluginContractValidate.js";
import type { ConversationPlugin, PluginApi, PluginModule } from "./pluginTypes.js";

const moduleExtensions = [".js", ".mjs", ".ts", ".mts"];

const pluginModuleSchema = z.object({
    name: z.string().min(1),
    create: z.custom<PluginModule["create"]>((value) => typeof value === "function")
});

const exportsSchema = z
    .object({
        plugin: z.unknown().optional(),
        default: z.unknown().optional()
    })
    .passthrough();

export type LoadedPlugin = {
    name: string;
    plugin: ConversationPlugin;
};

const logger = getLogger("plugins.loader");

/**
 * Imports an extension module and creates its validated instance.
 * Expects: the module exports `plugin` or `default`, built with definePlugin.
 */
export async function pluginLoad(entryPath: string, api: PluginApi, basePath: string = process.cwd()): Promise<LoadedPlugin> {
    const resolved = await resolveFile(path.resolve(basePath, entryPath));
    if (!resolved) {
        throw new Error(`Plugin entry not found: ${entryPath}`);
    }

    const imported: unknown = await import(pathToFileURL(resolved).href);
    const exports = exportsSchema.safeParse(imported);
    const candidate = exports.success ? (exports.data.plugin ?? exports.data.default) : undefined;
    const module = pluginModuleSchema.safeParse(candidate);
    if (!module.success) {
        throw new Error(`Plugin module did not export a plugin: ${resolved}`);
    }

    const created = await module.data.create(api);
    const plugin = pluginContractValidate(module.data.name, created);
    logger.info({ plugin: module.data.name }, "load: Plugin loaded");
    return { name: module.data.name, plugin };
}

async function resolveFile(target: string): Promise<string | null> {
    if (await isFile(target)) {
        return target;
    }
    if (path.extname(target)) {
        return null;
    }
    for (const extension of moduleExtensions) {
        const candidate = `${target}${extension}`;
        if (await isFile(candidate)) {
            return candidate;
        }
    }
    return null;
}

async function isFile(target: string): Promise<boolean> {
    try {
        return (await fs.stat(target)).isFile();
    } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            return false;
        }
        throw error;
    }
}
