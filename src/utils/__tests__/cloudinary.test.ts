import { describe, expect, it } from "vitest";
import { get_resource_type, parse_cloudinary_url } from "@/utils/cloudinary";

describe("get_resource_type", () => {
    it("maps images, media and documents", () => {
        expect(get_resource_type("image/png")).toBe("image");
        expect(get_resource_type("video/mp4")).toBe("video");
        expect(get_resource_type("audio/mpeg")).toBe("video");
        expect(get_resource_type("application/pdf")).toBe("raw");
    });

    it("stores svg as raw", () => {
        expect(get_resource_type("image/svg+xml")).toBe("raw");
    });
});

describe("parse_cloudinary_url", () => {
    it("keeps the extension of raw files in the public_id", () => {
        expect(
            parse_cloudinary_url("https://res.cloudinary.com/demo/raw/upload/v1767225600/contracts_files/contracts/c-1/f00d.pdf")
        ).toEqual({ resource_type: "raw", public_id: "contracts_files/contracts/c-1/f00d.pdf" });
    });

    it("drops the extension of images", () => {
        expect(
            parse_cloudinary_url("https://res.cloudinary.com/demo/image/upload/v1767225600/contracts_files/contracts/c-1/f00d.jpg")
        ).toEqual({ resource_type: "image", public_id: "contracts_files/contracts/c-1/f00d" });
    });

    it("accepts urls without version", () => {
        expect(parse_cloudinary_url("https://res.cloudinary.com/demo/video/upload/clips/intro.mp4")).toEqual({
            resource_type: "video",
            public_id: "clips/intro"
        });
    });

    it("returns null for foreign urls", () => {
        expect(parse_cloudinary_url("https://files.test/contracts/c-1/upload-1")).toBeNull();
    });
});
