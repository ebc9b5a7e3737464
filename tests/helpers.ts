import { vi } from "vitest";
import { loadSettings, type Settings } from "../config.js";
import type { AppContext } from "../services/context.js";
import type { GenerationClient } from "../services/generationService.js";
import type { ImageSearchClient } from "../services/imageSearchService.js";
import { Taxonomy } from "../services/taxonomy.js";
import { TokenAccumulator } from "../services/tokenAccumulator.js";
import { computeCost, type TokenRates } from "../services/tokenCost.js";
import type { EnrichmentRecord, ImageCandidate } from "../types.js";

export const TEST_RATES: TokenRates = { inputPerMillion: 0.1, outputPerMillion: 0.4, usdToInr: 86 };

export function testSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    ...loadSettings({}),
    taxonomyPath: "./tests/does-not-exist.xlsx",
    ...overrides
  };
}

/** Generation stub that always answers `text` with fixed token counts. */
export function stubGeneration(text: string, inputTokens = 100, outputTokens = 20) {
  const generate = vi.fn(async (_prompt: string, _requestId?: string) => ({
    text,
    inputTokens,
    outputTokens,
    costs: computeCost(inputTokens, outputTokens, TEST_RATES)
  }));
  const client: GenerationClient = { generate };
  return { client, generate };
}

export function stubImageSearch(candidates: ImageCandidate[]) {
  const search = vi.fn(
    async (_mpn: string, _manufacturer?: string | null, _requestId?: string) => candidates
  );
  const client: ImageSearchClient = { search };
  return { client, search };
}

export function candidate(url: string, sourceUrl = "", thumbnailUrl = ""): ImageCandidate {
  return { title: "Product Image", url, sourceUrl, thumbnailUrl, width: 0, height: 0 };
}

export function testContext(overrides: Partial<AppContext> = {}): AppContext {
  return {
    settings: testSettings(),
    generation: stubGeneration("{}").client,
    imageSearch: stubImageSearch([]).client,
    taxonomy: new Taxonomy(),
    usage: new TokenAccumulator(),
    ...overrides
  };
}

export function record(overrides: Partial<EnrichmentRecord> = {}): EnrichmentRecord {
  return {
    mpn: "ABC123",
    manufacturer: null,
    category: null,
    subcategory: null,
    imageUrl: null,
    manufacturerMatch: false,
    attributes: {},
    requestedAttributes: [],
    confidence: "LOW",
    processingTimeSeconds: 0.01,
    tokenUsage: { inputTokens: 0, outputTokens: 0, totalTokens: 0, costInr: 0 },
    rawModelResponse: null,
    ...overrides
  };
}
