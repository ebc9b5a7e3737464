import type { ImageCandidate, ImageMatch } from "../types.js";

/** Only absolute http(s) URLs are usable; data:, x-raw-image: and scheme-less values are not. */
export function isValidUrl(url: string | null | undefined): url is string {
  if (!url) return false;
  return url.startsWith("http://") || url.startsWith("https://");
}

const NO_MATCH: ImageMatch = {
  imageUrl: null,
  thumbnailUrl: null,
  sourceUrl: null,
  manufacturerMatch: false,
  confidence: "LOW"
};

function toMatch(image: ImageCandidate, manufacturerMatch: boolean): ImageMatch {
  return {
    imageUrl: image.url,
    thumbnailUrl: image.thumbnailUrl || null,
    sourceUrl: image.sourceUrl || null,
    manufacturerMatch,
    confidence: manufacturerMatch ? "HIGH" : "MEDIUM"
  };
}

/**
 * Pick the product image to publish.
 *
 * 1. First candidate hosted on a page whose URL contains the manufacturer name.
 * 2. Otherwise the first candidate with a usable URL.
 * 3. Otherwise nothing.
 */
export function selectBestImage(
  candidates: readonly ImageCandidate[],
  manufacturer?: string | null
): ImageMatch {
  if (candidates.length === 0) {
    return { ...NO_MATCH };
  }

  const mfgLower = manufacturer?.trim().toLowerCase();
  if (mfgLower) {
    const fromManufacturer = candidates.find(
      (image) => image.sourceUrl.toLowerCase().includes(mfgLower)
    );
    if (fromManufacturer) {
      return toMatch(fromManufacturer, true);
    }
  }

  const firstValid = candidates.find((image) => isValidUrl(image.url));
  return firstValid ? toMatch(firstValid, false) : { ...NO_MATCH };
}
