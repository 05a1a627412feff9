import type { Logger } from "pino";
import { z } from "zod";

import type { ImagePayload } from "../conversation/conversationTypes.js";
import { getLogger } from "../log.js";
import { pluginCommandsValidate } from "./pluginContractValidate.js";
import { PluginFailure } from "./pluginErrors.js";
import { PluginHealth } from "./pluginHealth.js";
import { type PluginInvokeResult, pluginInvoke } from "./pluginInvoke.js";
import type {
    ConversationPlugin,
    ImageHookName,
    LifecycleHookName,
    PluginCommand,
    PluginContext,
    PluginContextInput,
    TextHookName
} from "./pluginTypes.js";

export const DEFAULT_PLUGIN_TIMEOUT_MS = 5_000;
export const DEFAULT_PLUGIN_MAX_FAILURES = 3;

export type PluginPipelineOptions = {
    name: string;
    plugin: ConversationPlugin | null;
    timeoutMs?: number;
    maxFailures?: number;
};

export type PluginCommandInfo = {
    name: string;
    description: string;
    availableWhenLocked: boolean;
};

const anySchema = z.unknown();
const textSchema = z.string();
const imagesSchema = z.array(z.object({ data: z.instanceof(Buffer), mimeType: z.string().min(1) }));

/**
 * Runs the extension's hooks with a deadline per call and a shared health record.
 * Expects: every call returns its input unchanged when the extension is absent,
 * disabled, or the hook fails. Metadata writes made by a call take effect only
 * when it finishes in time.
 */
export class PluginPipeline {
    readonly name: string;
    readonly health: PluginHealth;
    private readonly plugin: ConversationPlugin | null;
    private readonly commands: Record<string, PluginCommand>;
    private readonly timeoutMs: number;
    private readonly logger: Logger;

    constructor(options: PluginPipelineOptions) {
        this.name = options.name;
        this.plugin = options.plugin;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_PLUGIN_TIMEOUT_MS;
        this.health = new PluginHealth(options.maxFailures ?? DEFAULT_PLUGIN_MAX_FAILURES);
        this.logger = getLogger(`plugin.${options.name}`);
        this.commands = this.commandsLoad();
    }

    isActive(): boolean {
        return this.plugin !== null && !this.health.isDisabled();
    }

    async runText(hook: TextHookName, text: string, input: PluginContextInput): Promise<string> {
        const plugin = this.activePlugin();
        if (!plugin) {
            return text;
        }
        const outcome = await this.call(hook, input, textSchema, (ctx) => plugin[hook](text, ctx));
        return outcome.ok ? outcome.value : text;
    }

    async runImages(
        hook: ImageHookName,
        images: ImagePayload[],
        text: string,
        input: PluginContextInput
    ): Promise<ImagePayload[]> {
        const plugin = this.activePlugin();
        if (!plugin) {
            return images;
        }
        const outcome = await this.call(hook, input, imagesSchema, (ctx) => plugin[hook]([...images], text, ctx));
        return outcome.ok ? outcome.value : images;
    }

    async runLifecycle(hook: LifecycleHookName, chatId: string, input: PluginContextInput): Promise<void> {
        const plugin = this.activePlugin();
        if (!plugin) {
            return;
        }
        await this.call(hook, input, anySchema, (ctx) => plugin[hook](chatId, ctx));
    }

    listCommands(locked: boolean): PluginCommandInfo[] {
        if (!this.activePlugin()) {
            return [];
        }
        return Object.entries(this.commands)
            .filter(([, command]) => !locked || command.availableWhenLocked !== false)
            .map(([name, command]) => ({
                name,
                description: command.description,
                availableWhenLocked: command.availableWhenLocked !== false
            }));
    }

    /**
     * Runs a custom command.
     * Returns true when handled, false when unknown or unavailable, null when the handler failed.
     */
    async runCommand(name: string, chatId: string, input: PluginContextInput): Promise<boolean | null> {
        const command = this.activePlugin() && Object.hasOwn(this.commands, name) ? this.commands[name] : undefined;
        if (!command) {
            return false;
        }
        if (input.locked && command.availableWhenLocked === false) {
            this.logger.debug(`skip: Command unavailable in locked mode command=${name}`);
            return false;
        }
        const outcome = await this.call(`command:${name}`, input, anySchema, (ctx) => command.handler(chatId, ctx));
        return outcome.ok ? true : null;
    }

    private activePlugin(): ConversationPlugin | null {
        return this.isActive() ? this.plugin : null;
    }

    /** Reads the command table once; a broken table leaves the extension without commands. */
    private commandsLoad(): Record<string, PluginCommand> {
        if (!this.plugin?.getCommands) {
            return {};
        }
        let raw: unknown;
        try {
            raw = this.plugin.getCommands();
        } catch (error) {
            this.logger.warn({ error }, "register: getCommands failed; extension has no commands");
            return {};
        }
        const commands = pluginCommandsValidate(raw);
        if (!commands) {
            this.logger.warn("register: getCommands returned an invalid command table; extension has no commands");
            return {};
        }
        this.logger.debug(`register: Commands registered count=${Object.keys(commands).length}`);
        return commands;
    }

    /**
     * Invokes a hook on a private copy of the metadata. The call counts as a
     * success only when its result matches `schema`; only then are metadata writes kept.
     */
    private async call<T>(
        hook: string,
        input: PluginContextInput,
        schema: z.ZodType<T>,
        run: (ctx: PluginContext) => unknown
    ): Promise<PluginInvokeResult<T>> {
        const metadata = { ...input.metadata };
        const outcome = await pluginInvoke(hook, this.timeoutMs, (signal) =>
            run({ ...input, metadata, signal, logger: this.logger })
        );
        if (!outcome.ok) {
            this.fail(outcome.failure);
            return outcome;
        }
        const parsed = schema.safeParse(outcome.value);
        if (!parsed.success) {
            const failure = new PluginFailure(hook, "shape", `Hook ${hook} returned a value of the wrong shape`, {
                cause: parsed.error
            });
            this.fail(failure);
            return { ok: false, failure };
        }
        this.health.recordSuccess(hook);
        metadataCommit(input.metadata, metadata);
        return { ok: true, value: parsed.data };
    }

    private fail(failure: PluginFailure): void {
        const disabled = this.health.recordFailure(failure.hook);
        this.logger.warn(
            { hook: failure.hook, reason: failure.reason, error: failure },
            `event: Plugin hook failed failures=${this.health.failures(failure.hook)}`
        );
        if (disabled) {
            this.logger.error(
                `event: Plugin disabled after ${this.health.maxFailures} failures; hooks now pass input through`
            );
        }
    }
}

function metadataCommit(target: Record<string, unknown>, source: Record<string, unknown>): void {
    for (const key of Object.keys(target)) {
        if (!Object.hasOwn(source, key)) {
            delete target[key];
        }
    }
    Object.assign(target, source);
}
