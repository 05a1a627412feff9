const signatures: Array<{ mimeType: string; bytes: number[]; offset?: number }> = [
    { mimeType: "image/png", bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
    { mimeType: "image/jpeg", bytes: [0xff, 0xd8, 0xff] },
    { mimeType: "image/gif", bytes: [0x47, 0x49, 0x46, 0x38] },
    // "WEBP" after the RIFF header
    { mimeType: "image/webp", bytes: [0x57, 0x45, 0x42, 0x50], offset: 8 }
];

/**
 * Detects an image mime type from leading magic bytes.
 * Returns null when the bytes match no known image format.
 */
export function imageMimeSniff(data: Uint8Array): string | null {
    for (const signature of signatures) {
        const offset = signature.offset ?? 0;
        if (data.length < offset + signature.bytes.length) {
            continue;
        }
        if (signature.bytes.every((byte, index) => data[offset + index] === byte)) {
            return signature.mimeType;
        }
    }
    return null;
}
