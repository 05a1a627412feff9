import { createHash } from "node:crypto";

export type ImageFingerprint = {
    hash: string;
    byteLength: number;
};

export function imageFingerprint(data: Uint8Array): ImageFingerprint {
    return {
        hash: createHash("sha256").update(data).digest("hex"),
        byteLength: data.length
    };
}
