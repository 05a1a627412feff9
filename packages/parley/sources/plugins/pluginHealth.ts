/**
 * Failure counters per hook name plus one disabled flag for the extension.
 * Expects: the extension is disabled once the sum of counters reaches maxFailures
 * and never re-enabled.
 */
export class PluginHealth {
    readonly maxFailures: number;
    private counters = new Map<string, number>();
    private disabled = false;

    constructor(maxFailures: number) {
        this.maxFailures = maxFailures;
    }

    isDisabled(): boolean {
        return this.disabled;
    }

    failures(hook: string): number {
        return this.counters.get(hook) ?? 0;
    }

    totalFailures(): number {
        let total = 0;
        for (const count of this.counters.values()) {
            total += count;
        }
        return total;
    }

    recordSuccess(hook: string): void {
        this.counters.delete(hook);
    }

    /** Returns true when this failure disabled the extension. */
    recordFailure(hook: string): boolean {
        this.counters.set(hook, this.failures(hook) + 1);
        if (!this.disabled && this.totalFailures() >= this.maxFailures) {
            this.disabled = true;
            return true;
        }
        return false;
    }
}
