import { GoogleGenAI } from "@google/genai";
import type { Settings } from "../config.js";
import type { GenerationResult } from "../types.js";
import { errorMessage } from "./errors.js";
import { createRequestLogger } from "./logger.js";
import { parseAttributesFromPrompt } from "./promptTemplates.js";
import { computeCost, countTokens, ZERO_COSTS, type TokenRates } from "./tokenCost.js";

export interface GenerationClient {
  generate(prompt: string, requestId?: string): Promise<GenerationResult>;
}

export function ratesFromSettings(settings: Settings): TokenRates {
  return {
    inputPerMillion: settings.inputTokenCostPerMillion,
    outputPerMillion: settings.outputTokenCostPerMillion,
    usdToInr: settings.usdToInr
  };
}

/**
 * A result that downstream extraction treats like any other model reply:
 * the JSON parses to `{ error }`, which the attribute filter drops.
 */
function sentinel(message: string, inputTokens: number): GenerationResult {
  return {
    text: JSON.stringify({ error: message }),
    inputTokens,
    outputTokens: 0,
    costs: ZERO_COSTS
  };
}

export function createGenerationClient(settings: Settings): GenerationClient {
  const rates = ratesFromSettings(settings);
  let client: GoogleGenAI | null = null;

  function getClient(): GoogleGenAI {
    if (!client) {
      client = new GoogleGenAI({ apiKey: settings.googleApiKey });
    }
    return client;
  }

  function priced(text: string, inputTokens: number): GenerationResult {
    const outputTokens = countTokens(text);
    return {
      text,
      inputTokens,
      outputTokens,
      costs: computeCost(inputTokens, outputTokens, rates)
    };
  }

  return {
    async generate(prompt, requestId) {
      const log = createRequestLogger("gemini", requestId);
      const inputTokens = countTokens(prompt);
      log.info({ inputTokens }, "Prepared prompt");

      if (settings.mockGeminiApi) {
        const mock = Object.fromEntries(
          parseAttributesFromPrompt(prompt).map((attr) => [attr, ""])
        );
        return priced(JSON.stringify(mock), inputTokens);
      }

      if (!settings.googleApiKey) {
        log.error("GOOGLE_API_KEY is not set. Cannot call Gemini API.");
        return sentinel("API key not configured", inputTokens);
      }

      try {
        log.info({ model: settings.geminiModel }, "Sending prompt to Gemini");
        const response = await getClient().models.generateContent({
          model: settings.geminiModel,
          contents: [
            {
              role: "user",
              parts: [{ text: prompt }]
            }
          ],
          config: {
            temperature: 0,
            topP: 0.9,
            maxOutputTokens: 1000,
            tools: [{ googleSearch: {} }]
          }
        });

        const text = response.text ?? "";
        const result = priced(text, inputTokens);
        log.info(
          {
            chars: text.length,
            outputTokens: result.outputTokens,
            costInr: result.costs.inr.total
          },
          "Received response from Gemini"
        );
        return result;
      } catch (err) {
        log.error({ err: errorMessage(err) }, "Error calling Gemini API");
        return sentinel(`API call failed: ${errorMessage(err)}`, inputTokens);
      }
    }
  };
}
