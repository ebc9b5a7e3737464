import type { Settings } from "../config.js";
import type { EnrichmentDeps } from "./enrichProduct.js";
import { createGenerationClient, type GenerationClient } from "./generationService.js";
import { createImageSearchClient, type ImageSearchClient } from "./imageSearchService.js";
import { loadTaxonomy, type Taxonomy } from "./taxonomy.js";
import { TokenAccumulator } from "./tokenAccumulator.js";

/** Everything a request handler or background job needs, built once at startup. */
export interface AppContext {
  settings: Settings;
  generation: GenerationClient;
  imageSearch: ImageSearchClient;
  taxonomy: Taxonomy;
  // Running totals for single enrichments since the process started.
  usage: TokenAccumulator;
}

export function createAppContext(settings: Settings): AppContext {
  return {
    settings,
    generation: createGenerationClient(settings),
    imageSearch: createImageSearchClient(settings),
    taxonomy: loadTaxonomy(settings.taxonomyPath),
    usage: new TokenAccumulator()
  };
}

export function enrichmentDeps(context: AppContext, accumulator: TokenAccumulator): EnrichmentDeps {
  return {
    generation: context.generation,
    imageSearch: context.imageSearch,
    taxonomy: context.taxonomy,
    accumulator,
    trackTokens: context.settings.enableTokenTracking,
    includeRawResponse: context.settings.includeRawResponse
  };
}
