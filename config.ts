export interface Settings {
  host: string;
  port: number;

  googleApiKey: string;
  googleCseId: string;
  geminiModel: string;

  maxBatchSize: number;
  maxRowsToProcess: number;
  imageSearchConcurrency: number;

  usdToInr: number;
  inputTokenCostPerMillion: number;
  outputTokenCostPerMillion: number;

  taxonomyPath: string;
  outputDir: string;

  enableTokenTracking: boolean;
  includeRawResponse: boolean;
  mockGeminiApi: boolean;
}

function parseIntEnv(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new Error(`Invalid integer env var: ${name}=${value}`);
  }
  return parsed;
}

function parseFloatEnv(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid number env var: ${name}=${value}`);
  }
  return parsed;
}

export function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return ["true", "1", "t", "yes"].includes(value.trim().toLowerCase());
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    host: env.HOST ?? "127.0.0.1",
    port: parseIntEnv("PORT", env.PORT, 8080),

    googleApiKey: env.GOOGLE_API_KEY ?? "",
    googleCseId: env.GOOGLE_CSE_ID ?? "",
    geminiModel: env.GEMINI_MODEL || "gemini-2.0-flash",

    maxBatchSize: parseIntEnv("MAX_BATCH_SIZE", env.MAX_BATCH_SIZE, 50),
    maxRowsToProcess: parseIntEnv("MAX_ROWS_TO_PROCESS", env.MAX_ROWS_TO_PROCESS, 2000),
    imageSearchConcurrency: parseIntEnv(
      "IMAGE_SEARCH_CONCURRENCY",
      env.IMAGE_SEARCH_CONCURRENCY,
      4
    ),

    usdToInr: parseFloatEnv("USD_TO_INR", env.USD_TO_INR, 86.0),
    inputTokenCostPerMillion: parseFloatEnv(
      "INPUT_TOKEN_COST_PER_MILLION",
      env.INPUT_TOKEN_COST_PER_MILLION,
      0.1
    ),
    outputTokenCostPerMillion: parseFloatEnv(
      "OUTPUT_TOKEN_COST_PER_MILLION",
      env.OUTPUT_TOKEN_COST_PER_MILLION,
      0.4
    ),

    taxonomyPath: env.TAXONOMY_PATH || "./data/taxonomy.xlsx",
    outputDir: env.OUTPUT_DIR || "./output",

    enableTokenTracking: parseBool(env.ENABLE_TOKEN_TRACKING, true),
    includeRawResponse: parseBool(env.INCLUDE_RAW_RESPONSE, true),
    mockGeminiApi: parseBool(env.MOCK_GEMINI_API, false)
  };
}
