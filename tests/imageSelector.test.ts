import { describe, expect, it } from "vitest";
import { isValidUrl, selectBestImage } from "../services/imageSelector.js";
import { candidate } from "./helpers.js";

describe("isValidUrl", () => {
  it("accepts only absolute http(s) URLs", () => {
    expect(isValidUrl("https://example.com/a.jpg")).toBe(true);
    expect(isValidUrl("http://example.com/a.jpg")).toBe(true);
    expect(isValidUrl("data:image/png;base64,AAAA")).toBe(false);
    expect(isValidUrl("x-raw-image:///abc")).toBe(false);
    expect(isValidUrl("example.com/a.jpg")).toBe(false);
    expect(isValidUrl("")).toBe(false);
    expect(isValidUrl(null)).toBe(false);
  });
});

describe("selectBestImage", () => {
  it("prefers an image whose source page mentions the manufacturer", () => {
    const match = selectBestImage(
      [
        candidate("https://shop.example.com/1.jpg", "https://shop.example.com/p/1"),
        candidate(
          "https://cdn.example.net/2.jpg",
          "https://www.acme.com/products/2",
          "https://cdn.example.net/2-thumb.jpg"
        )
      ],
      "ACME"
    );

    expect(match).toEqual({
      imageUrl: "https://cdn.example.net/2.jpg",
      thumbnailUrl: "https://cdn.example.net/2-thumb.jpg",
      sourceUrl: "https://www.acme.com/products/2",
      manufacturerMatch: true,
      confidence: "HIGH"
    });
  });

  it("falls back to the first well-formed URL when nothing matches the manufacturer", () => {
    const match = selectBestImage(
      [
        candidate("data:image/png;base64,AAAA", "https://shop.example.com/p/0"),
        candidate("https://shop.example.com/1.jpg", "https://shop.example.com/p/1")
      ],
      "Acme"
    );

    expect(match).toEqual({
      imageUrl: "https://shop.example.com/1.jpg",
      thumbnailUrl: null,
      sourceUrl: "https://shop.example.com/p/1",
      manufacturerMatch: false,
      confidence: "MEDIUM"
    });
  });

  it("uses the first usable image without a manufacturer", () => {
    const match = selectBestImage([candidate("https://a.example.com/1.jpg")]);
    expect(match.imageUrl).toBe("https://a.example.com/1.jpg");
    expect(match.confidence).toBe("MEDIUM");
  });

  it("returns no image when there are no candidates", () => {
    expect(selectBestImage([], "Acme")).toEqual({
      imageUrl: null,
      thumbnailUrl: null,
      sourceUrl: null,
      manufacturerMatch: false,
      confidence: "LOW"
    });
  });

  it("returns no image when no candidate has a usable URL", () => {
    const match = selectBestImage([candidate("x-raw-image:///1"), candidate("ftp://example.com/2.jpg")]);
    expect(match.imageUrl).toBeNull();
    expect(match.confidence).toBe("LOW");
  });
});
