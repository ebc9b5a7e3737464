import { Router, type Request, type Response } from "express";
import { z } from "zod";
import type { EnrichmentRecord } from "../types.js";
import { enrichmentDeps, type AppContext } from "../services/context.js";
import { enrichProduct } from "../services/enrichProduct.js";
import { errorMessage, ValidationError } from "../services/errors.js";
import { createRequestLogger } from "../services/logger.js";

export interface HandlerResult {
  status: number;
  body: unknown;
}

export const EnrichRequestSchema = z.object({
  mpn: z.string().trim().min(1, "mpn is required"),
  manufacturer: z.string().nullish(),
  category: z.string().nullish(),
  subcategory: z.string().nullish(),
  attributes_to_extract: z.array(z.string()).nullish(),
  include_images: z.boolean().default(true)
});

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}

/** Wire shape of an enrichment result. */
export function toResponseBody(record: EnrichmentRecord) {
  return {
    mpn: record.mpn,
    manufacturer: record.manufacturer,
    category: record.category,
    subcategory: record.subcategory,
    image_url: record.imageUrl,
    manufacturer_match: record.manufacturerMatch,
    attributes: record.attributes,
    processing_time_seconds: record.processingTimeSeconds,
    confidence: record.confidence,
    requested_attributes: record.requestedAttributes,
    token_data: {
      input_tokens: record.tokenUsage.inputTokens,
      output_tokens: record.tokenUsage.outputTokens,
      total_tokens: record.tokenUsage.totalTokens,
      cost_inr: record.tokenUsage.costInr
    },
    raw_gemini_response: record.rawModelResponse
  };
}

export async function handleEnrich(body: unknown, context: AppContext): Promise<HandlerResult> {
  const requestId = `single-${Math.floor(Date.now() / 1000)}`;
  const log = createRequestLogger("api", requestId);

  const parsed = EnrichRequestSchema.safeParse(body);
  if (!parsed.success) {
    return { status: 400, body: { error: describeIssues(parsed.error) } };
  }
  const input = parsed.data;

  try {
    const record = await enrichProduct(
      {
        mpn: input.mpn,
        manufacturer: input.manufacturer ?? undefined,
        category: input.category ?? undefined,
        subcategory: input.subcategory ?? undefined,
        attributesToExtract: input.attributes_to_extract ?? undefined,
        includeImages: input.include_images,
        requestId
      },
      enrichmentDeps(context, context.usage)
    );
    return { status: 200, body: toResponseBody(record) };
  } catch (err) {
    if (err instanceof ValidationError) {
      return { status: err.status, body: { error: err.message } };
    }
    log.error({ err: errorMessage(err) }, "Error enriching product");
    return { status: 500, body: { error: `Error enriching product: ${errorMessage(err)}` } };
  }
}

export function createEnrichRouter(context: AppContext): Router {
  const router = Router();

  router.post("/", async (req: Request, res: Response) => {
    const result = await handleEnrich(req.body, context);
    res.status(result.status).json(result.body);
  });

  return router;
}
