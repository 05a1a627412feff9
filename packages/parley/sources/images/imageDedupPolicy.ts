import type { ImageFingerprint } from "./imageFingerprint.js";

/**
 * Decides whether a candidate repeats an already accepted image.
 */
export interface ImageDedupPolicy {
    isDuplicate(candidate: ImageFingerprint, accepted: readonly ImageFingerprint[]): boolean;
}

export const DEFAULT_NEAR_DUPLICATE_RATIO = 0.001;

/**
 * Exact hash match, then byte-length ratio below `nearDuplicateRatio`.
 * A ratio of 0 disables the near-duplicate check.
 */
export function imageDedupPolicyBuild(nearDuplicateRatio: number = DEFAULT_NEAR_DUPLICATE_RATIO): ImageDedupPolicy {
    return {
        isDuplicate: (candidate, accepted) => {
            for (const entry of accepted) {
                if (entry.hash === candidate.hash) {
                    return true;
                }
                if (nearDuplicateRatio > 0 && lengthRatio(entry.byteLength, candidate.byteLength) < nearDuplicateRatio) {
                    return true;
                }
            }
            return false;
        }
    };
}

function lengthRatio(a: number, b: number): number {
    const largest = Math.max(a, b);
    if (largest === 0) {
        return 0;
    }
    return Math.abs(a - b) / largest;
}
