export type Confidence = "LOW" | "MEDIUM" | "HIGH";

export interface RawComponentData {
  mpn: string;
  manufacturer?: string;
  category?: string;
  subcategory?: string;
}

export interface EnrichmentRequest extends RawComponentData {
  // Empty or missing means "use the taxonomy default for the category".
  attributesToExtract?: string[];
  includeImages: boolean;
  requestId?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  costInr: number;
}

export interface EnrichmentRecord {
  mpn: string;
  manufacturer: string | null;
  category: string | null;
  subcategory: string | null;
  imageUrl: string | null;
  manufacturerMatch: boolean;
  attributes: Record<string, unknown>;
  requestedAttributes: string[];
  confidence: Confidence;
  processingTimeSeconds: number;
  tokenUsage: TokenUsage;
  rawModelResponse: string | null;
}

export interface CostBreakdown {
  input: number;
  output: number;
  total: number;
}

export interface TokenCosts {
  usd: CostBreakdown;
  inr: CostBreakdown;
}

export interface GenerationResult {
  text: string;
  inputTokens: number;
  outputTokens: number;
  costs: TokenCosts;
}

export interface ImageCandidate {
  title: string;
  url: string;
  sourceUrl: string;
  thumbnailUrl: string;
  width: number;
  height: number;
}

export interface ImageMatch {
  imageUrl: string | null;
  thumbnailUrl: string | null;
  sourceUrl: string | null;
  manufacturerMatch: boolean;
  confidence: Confidence;
}

export type CellValue = string | number | boolean;

export type InputRow = Record<string, string>;

export interface InputTable {
  columns: string[];
  rows: InputRow[];
}

export interface BatchJob {
  jobId: string;
  table: InputTable;
  mpnColumn: string;
  includeImages: boolean;
  windowSize: number;
}

export interface TokenTotals {
  totalInputTokens: number;
  totalOutputTokens: number;
  totalTokens: number;
  totalCostInr: number;
}
