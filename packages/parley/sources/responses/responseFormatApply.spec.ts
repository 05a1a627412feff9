import { describe, expect, it } from "vitest";

import { responseFormatApply } from "./responseFormatApply.js";

const image = { data: Buffer.from([1, 2, 3]), mimeType: "image/png" };

describe("responseFormatApply", () => {
    it("leaves auto replies untouched", () => {
        const response = { text: "hi", images: [image] };
        expect(responseFormatApply(response, "auto")).toBe(response);
    });

    it("drops images for text", () => {
        expect(responseFormatApply({ text: "hi", images: [image] }, "text")).toEqual({ text: "hi", images: [] });
    });

    it("drops text for image when an image exists", () => {
        expect(responseFormatApply({ text: "hi", images: [image] }, "image")).toEqual({ text: "", images: [image] });
    });

    it("notes a missing image for image", () => {
        expect(responseFormatApply({ text: "hi", images: [] }, "image")).toEqual({
            text: "hi\n\n[No image was generated for this response.]",
            images: []
        });
    });

    it("labels image-only replies for both", () => {
        expect(responseFormatApply({ text: "", images: [image] }, "both")).toEqual({
            text: "[Image generated]",
            images: [image]
        });
    });

    it("notes a missing image for both", () => {
        expect(responseFormatApply({ text: "hi", images: [] }, "both")).toEqual({
            text: "hi\n\n[No image was generated for this response.]",
            images: []
        });
    });

    it("treats unknown formats as auto", () => {
        const response = { text: "hi", images: [] };
        expect(responseFormatApply(response, "sepia")).toBe(response);
    });
});
