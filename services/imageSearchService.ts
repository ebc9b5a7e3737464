// services/imageSearchService.ts
import fetch from "node-fetch";
import pLimit from "p-limit";
import { z } from "zod";
import type { Settings } from "../config.js";
import type { ImageCandidate } from "../types.js";
import { errorMessage } from "./errors.js";
import { isValidUrl } from "./imageSelector.js";
import { createRequestLogger } from "./logger.js";

const CSE_ENDPOINT = "https://www.googleapis.com/customsearch/v1";
const NUM_RESULTS = 10;

/* -----------------------------
   Types
----------------------------- */

export interface ImageSearchClient {
  search(mpn: string, manufacturer?: string | null, requestId?: string): Promise<ImageCandidate[]>;
}

const CseItemSchema = z.object({
  title: z.string().optional(),
  link: z.string().optional(),
  image: z
    .object({
      contextLink: z.string().optional(),
      height: z.number().optional(),
      width: z.number().optional(),
      thumbnailLink: z.string().optional()
    })
    .optional()
});

const CseResponseSchema = z.object({
  items: z.array(CseItemSchema).optional()
});

type CseItem = z.infer<typeof CseItemSchema>;

/* -----------------------------
   Public API
----------------------------- */

export function buildImageQuery(mpn: string, manufacturer?: string | null): string {
  return manufacturer ? `${mpn} product ${manufacturer}` : `${mpn} product`;
}

/**
 * Google Custom Search image client.
 *
 * Requests go through a bounded pool (IMAGE_SEARCH_CONCURRENCY) so a wide
 * bulk window cannot open more search connections than the quota allows.
 * Every failure, including missing credentials, comes back as `[]`.
 */
export function createImageSearchClient(settings: Settings): ImageSearchClient {
  const limit = pLimit(settings.imageSearchConcurrency);

  return {
    async search(mpn, manufacturer, requestId) {
      const log = createRequestLogger("image-search", requestId);

      if (!settings.googleApiKey || !settings.googleCseId) {
        log.warn("Google API key or CSE ID not configured");
        return [];
      }

      try {
        log.info({ mpn }, "Searching for part images");
        const items = await limit(() =>
          runCseQuery(buildImageQuery(mpn, manufacturer), settings)
        );
        const images = toCandidates(items);
        log.info({ mpn, found: images.length }, "Image search complete");
        return images;
      } catch (err) {
        log.error({ err: errorMessage(err) }, "Error in Google Custom Search");
        return [];
      }
    }
  };
}

/* -----------------------------
   Custom Search Query
----------------------------- */

async function runCseQuery(query: string, settings: Settings): Promise<CseItem[]> {
  const params = new URLSearchParams({
    key: settings.googleApiKey,
    cx: settings.googleCseId,
    q: query,
    searchType: "image",
    num: String(NUM_RESULTS),
    imgType: "photo",
    fileType: "jpg|png",
    safe: "off"
  });

  const response = await fetch(`${CSE_ENDPOINT}?${params.toString()}`);
  if (!response.ok) {
    throw new Error(`Custom Search error: ${response.status}`);
  }

  const parsed = CseResponseSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new Error(`Unexpected Custom Search response: ${parsed.error.message}`);
  }
  return parsed.data.items ?? [];
}

/* -----------------------------
   Result Mapping
----------------------------- */

function keepValid(url: string | undefined): string {
  return isValidUrl(url) ? url : "";
}

export function toCandidates(items: readonly CseItem[]): ImageCandidate[] {
  const images: ImageCandidate[] = [];

  for (const item of items) {
    const link = item.link;
    if (!link || link.startsWith("x-raw-image:") || !isValidUrl(link)) {
      continue;
    }

    images.push({
      title: item.title ?? "Product Image",
      url: link,
      sourceUrl: keepValid(item.image?.contextLink),
      thumbnailUrl: keepValid(item.image?.thumbnailLink),
      width: item.image?.width ?? 0,
      height: item.image?.height ?? 0
    });
  }

  return images;
}
