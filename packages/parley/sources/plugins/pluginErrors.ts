export type PluginFailureReason = "error" | "timeout" | "shape";

/**
 * A hook or command call that threw, ran past its deadline, or returned the wrong shape.
 * Expects: the pipeline substitutes the hook input and counts the failure.
 */
export class PluginFailure extends Error {
    readonly hook: string;
    readonly reason: PluginFailureReason;

    constructor(hook: string, reason: PluginFailureReason, message: string, options?: { cause?: unknown }) {
        super(message, { cause: options?.cause });
        this.name = "PluginFailure";
        this.hook = hook;
        this.reason = reason;
    }
}

/**
 * The extension object does not implement every hook.
 */
export class PluginContractError extends Error {
    readonly missing: string[];

    constructor(pluginName: string, missing: string[]) {
        super(`Plugin "${pluginName}" is missing hooks: ${missing.join(", ")}`);
        this.name = "PluginContractError";
        this.missing = missing;
    }
}
