import type { ImagePayload } from "../conversation/conversationTypes.js";
import { getLogger } from "../log.js";
import { type ImageDedupPolicy, imageDedupPolicyBuild } from "./imageDedupPolicy.js";
import { type ImageFingerprint, imageFingerprint } from "./imageFingerprint.js";

const logger = getLogger("images.dedup");

/**
 * Drops repeated images, keeping the first occurrence of each in order.
 * Expects: policy compares fingerprints only; payload bytes are not mutated.
 */
export function imageDeduplicate(
    images: readonly ImagePayload[],
    policy: ImageDedupPolicy = imageDedupPolicyBuild()
): ImagePayload[] {
    const accepted: ImagePayload[] = [];
    const fingerprints: ImageFingerprint[] = [];

    for (const image of images) {
        const fingerprint = imageFingerprint(image.data);
        if (policy.isDuplicate(fingerprint, fingerprints)) {
            logger.debug(`skip: Duplicate image dropped bytes=${fingerprint.byteLength} hash=${fingerprint.hash.slice(0, 12)}`);
            continue;
        }
        fingerprints.push(fingerprint);
        accepted.push(image);
    }

    return accepted;
}
