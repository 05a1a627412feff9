export type ImageDataUrl = {
    mimeType: string;
    base64: string;
};

const DATA_URL_PATTERN = /^data:([^;,]+)((?:;[^;,]+)*);base64,(.*)$/s;

/**
 * Splits a `data:<mime>;base64,<payload>` url into its parts.
 * Returns null for anything that is not a base64 data url.
 */
export function imageDataUrlParse(url: string): ImageDataUrl | null {
    const match = DATA_URL_PATTERN.exec(url.trim());
    if (!match) {
        return null;
    }
    const mimeType = match[1]?.trim().toLowerCase() ?? "";
    const base64 = match[3] ?? "";
    if (!mimeType) {
        return null;
    }
    return { mimeType, base64 };
}

export function imageDataUrlBuild(data: Buffer, mimeType: string): string {
    return `data:${mimeType};base64,${data.toString("base64")}`;
}
