import type { ImagePayload } from "../conversation/conversationTypes.js";
import type { ImageDedupPolicy } from "../images/imageDedupPolicy.js";
import { imageDeduplicate } from "../images/imageDeduplicate.js";
import { ImageProcessingError } from "../images/imageProcessingError.js";
import { getLogger } from "../log.js";
import type { ImageCandidate, ProviderReply } from "../providers/providerTypes.js";
import { imageCandidateDecode } from "./imageCandidateDecode.js";
import type { NormalizedResponse } from "./responseTypes.js";

const logger = getLogger("responses.normalize");

/**
 * Turns a parsed provider reply into text plus unique decoded images.
 * Expects: side-array images win over content images whenever at least one
 * side entry decodes; remote references become `[Image URL: ...]` lines.
 */
export function responseNormalize(reply: ProviderReply, policy?: ImageDedupPolicy): NormalizedResponse {
    const side = candidatesDecode(reply.images.filter((candidate) => candidate.source === "side"));
    const content = candidatesDecode(reply.images.filter((candidate) => candidate.source === "content"));

    const useSide = side.images.length > 0;
    const images = useSide ? side.images : content.images;
    const remoteUrls = useSide ? side.remoteUrls : [...side.remoteUrls, ...content.remoteUrls];

    const markers = [...new Set(remoteUrls)].map((url) => `[Image URL: ${url}]`);
    const text = markers.length === 0 ? reply.text : [reply.text, markers.join("\n")].filter(Boolean).join("\n\n");

    return {
        text,
        images: imageDeduplicate(images, policy)
    };
}

function candidatesDecode(candidates: readonly ImageCandidate[]): { images: ImagePayload[]; remoteUrls: string[] } {
    const images: ImagePayload[] = [];
    const remoteUrls: string[] = [];
    for (const candidate of candidates) {
        if (candidate.kind === "remote") {
            remoteUrls.push(candidate.url);
            continue;
        }
        try {
            images.push(imageCandidateDecode(candidate));
        } catch (error) {
            if (!(error instanceof ImageProcessingError)) {
                throw error;
            }
            logger.warn({ error }, `skip: Malformed image dropped source=${candidate.source} kind=${error.kind}`);
        }
    }
    return { images, remoteUrls };
}
