import { PluginFailure } from "./pluginErrors.js";

export type PluginInvokeResult<T> = { ok: true; value: T } | { ok: false; failure: PluginFailure };

/**
 * Runs one hook call against a wall-clock deadline.
 * Expects: `run` receives a signal that aborts at the deadline; a synchronous
 * hook that never returns cannot be preempted.
 */
export async function pluginInvoke<T>(
    hook: string,
    timeoutMs: number,
    run: (signal: AbortSignal) => Promise<T> | T
): Promise<PluginInvokeResult<T>> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<PluginInvokeResult<T>>((resolve) => {
        timer = setTimeout(() => {
            controller.abort(new PluginFailure(hook, "timeout", `Hook ${hook} timed out after ${timeoutMs}ms`));
            resolve({
                ok: false,
                failure: new PluginFailure(hook, "timeout", `Hook ${hook} timed out after ${timeoutMs}ms`)
            });
        }, timeoutMs);
    });

    const call = (async (): Promise<PluginInvokeResult<T>> => {
        try {
            const value = await run(controller.signal);
            return { ok: true, value };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            return { ok: false, failure: new PluginFailure(hook, "error", `Hook ${hook} failed: ${message}`, { cause: error }) };
        }
    })();

    try {
        return await Promise.race([call, deadline]);
    } finally {
        clearTimeout(timer);
    }
}
