import type { EnrichmentRecord, EnrichmentRequest, GenerationResult, ImageCandidate } from "../types.js";
import { scoreConfidence } from "./confidence.js";
import { errorMessage, ValidationError } from "./errors.js";
import { extractJson } from "./extractJson.js";
import type { GenerationClient } from "./generationService.js";
import type { ImageSearchClient } from "./imageSearchService.js";
import { selectBestImage } from "./imageSelector.js";
import { createRequestLogger } from "./logger.js";
import { resolveTemplate } from "./promptTemplates.js";
import type { Taxonomy } from "./taxonomy.js";
import type { TokenAccumulator } from "./tokenAccumulator.js";

export interface EnrichmentDeps {
  generation: GenerationClient;
  imageSearch: ImageSearchClient;
  taxonomy: Taxonomy;
  // Receives every completed model call's usage while trackTokens is on.
  accumulator?: TokenAccumulator;
  trackTokens: boolean;
  includeRawResponse: boolean;
}

export type EnrichFn = (request: EnrichmentRequest) => Promise<EnrichmentRecord>;

// Prompt family used when a product arrives without a category.
const DEFAULT_CATEGORY = "Electrical";

/** Turns a synchronous throw from a collaborator into a rejection. */
async function attempt<T>(task: () => Promise<T>): Promise<T> {
  return task();
}

function emptyRecord(request: EnrichmentRequest, requestedAttributes: string[]): EnrichmentRecord {
  return {
    mpn: request.mpn,
    manufacturer: request.manufacturer ?? null,
    category: request.category ?? null,
    subcategory: request.subcategory ?? null,
    imageUrl: null,
    manufacturerMatch: false,
    attributes: {},
    requestedAttributes,
    confidence: "LOW",
    processingTimeSeconds: 0,
    tokenUsage: { inputTokens: 0, outputTokens: 0, totalTokens: 0, costInr: 0 },
    rawModelResponse: null
  };
}

/**
 * Enrich one part: image search and attribute extraction run side by side,
 * and a failure in either only empties that half of the record.
 *
 * Throws only for a malformed request (no MPN).
 */
export async function enrichProduct(
  request: EnrichmentRequest,
  deps: EnrichmentDeps
): Promise<EnrichmentRecord> {
  if (typeof request.mpn !== "string" || request.mpn.trim() === "") {
    throw new ValidationError("mpn is required");
  }

  const { mpn, manufacturer, category, subcategory, requestId } = request;
  const log = createRequestLogger("enrichment", requestId);
  const startTime = Date.now();

  log.info({ mpn, manufacturer }, "Enriching part");

  // 1. ATTRIBUTE LIST (request first, taxonomy default otherwise)
  const requestedAttributes =
    request.attributesToExtract && request.attributesToExtract.length > 0
      ? [...request.attributesToExtract]
      : deps.taxonomy.attributesFor(category, subcategory);

  const record = emptyRecord(request, requestedAttributes);

  // 2. LAUNCH BOTH TASKS
  const imageTask: Promise<ImageCandidate[] | null> = request.includeImages
    ? attempt(() => deps.imageSearch.search(mpn, manufacturer, requestId))
    : Promise.resolve(null);

  let attributeTask: Promise<GenerationResult | null> = Promise.resolve(null);
  if (requestedAttributes.length > 0) {
    const template = resolveTemplate(category || DEFAULT_CATEGORY);
    const prompt = template.buildPrompt(
      {
        mpn,
        manufacturer,
        catSubcat: category && subcategory ? `${category},${subcategory}` : null
      },
      requestedAttributes
    );
    log.debug({ template: template.key }, "Generated prompt");
    attributeTask = attempt(() => deps.generation.generate(prompt, requestId));
  }

  // 3. WAIT FOR BOTH
  const [imageOutcome, attributeOutcome] = await Promise.allSettled([imageTask, attributeTask]);

  if (imageOutcome.status === "rejected") {
    log.error({ err: errorMessage(imageOutcome.reason) }, "Error in image_search task");
  }
  if (attributeOutcome.status === "rejected") {
    log.error({ err: errorMessage(attributeOutcome.reason) }, "Error in attribute_extraction task");
  }

  const images = imageOutcome.status === "fulfilled" ? imageOutcome.value : null;
  const generation = attributeOutcome.status === "fulfilled" ? attributeOutcome.value : null;

  // 4. IMAGE
  if (images && images.length > 0) {
    const match = selectBestImage(images, manufacturer);
    record.imageUrl = match.imageUrl;
    record.manufacturerMatch = match.manufacturerMatch;
    if (match.manufacturerMatch) {
      log.info({ mpn }, "Found manufacturer-specific image");
    }
  }

  // 5. ATTRIBUTES
  if (generation) {
    record.tokenUsage = {
      inputTokens: generation.inputTokens,
      outputTokens: generation.outputTokens,
      totalTokens: generation.inputTokens + generation.outputTokens,
      costInr: generation.costs.inr.total
    };

    if (deps.trackTokens && deps.accumulator) {
      deps.accumulator.add(record.tokenUsage);
    }

    if (deps.includeRawResponse) {
      record.rawModelResponse = generation.text;
    }

    const extracted = extractJson(generation.text, log);
    if (requestedAttributes.length > 0) {
      const wanted = new Set(requestedAttributes);
      record.attributes = Object.fromEntries(
        Object.entries(extracted).filter(([key]) => wanted.has(key))
      );
      log.info(
        {
          extracted: Object.keys(extracted).length,
          kept: Object.keys(record.attributes).length
        },
        "Filtered attributes to requested fields"
      );
    } else {
      record.attributes = extracted;
    }

    record.confidence = scoreConfidence(requestedAttributes, record.attributes);
  }

  // 6. TIMING
  const elapsedSeconds = (Date.now() - startTime) / 1000;
  record.processingTimeSeconds = Math.round(elapsedSeconds * 100) / 100;

  log.info(
    { seconds: record.processingTimeSeconds, confidence: record.confidence },
    "Completed enrichment"
  );
  return record;
}
