import type { Logger } from "./logger.js";

/**
 * IMPORTANT:
 * Model output is untrusted. Nothing in here may throw; when no JSON
 * object can be recovered the caller gets `{}` and carries on.
 */

type ParseAttempt = {
  name: string;
  run: (text: string) => Record<string, unknown> | null;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Drop a BOM and a surrounding ```json fence, the two wrappers
 * Gemini most often puts around otherwise valid JSON.
 */
function unwrap(text: string): string {
  const cleaned = text.replace(/^\uFEFF/, "").trim();
  if (!cleaned.startsWith("```")) return cleaned;

  const lines = cleaned.split("\n");
  if (lines.length < 3) return cleaned;
  const last = lines[lines.length - 1].trim();
  return (last.startsWith("```") ? lines.slice(1, -1) : lines.slice(1)).join("\n").trim();
}

/** First `{` through the last `}` (greedy). */
export function findBraceBlock(text: string): string | null {
  const match = /\{[\s\S]*\}/.exec(text);
  return match ? match[0] : null;
}

export function repairJson(text: string): string {
  return (
    text
      // typographic quotes
      .replace(/[\u201C\u201D\u201E\u201F\u2033]/g, '"')
      .replace(/[\u2018\u2019\u201A\u201B\u2032]/g, "'")
      // 'single quoted' keys and values
      .replace(/(?<=[{,:[]\s*)'([^'"\\]*)'(?=\s*[:,}\]])/g, '"$1"')
      // trailing separators
      .replace(/,(\s*[}\]])/g, "$1")
      // bare keys
      .replace(/([{,]\s*)([A-Za-z_$][\w$-]*)(\s*:)/g, '$1"$2"$3')
  );
}

const ATTEMPTS: ParseAttempt[] = [
  { name: "direct", run: (text) => parseObject(unwrap(text)) },
  {
    name: "brace_block",
    run: (text) => {
      const block = findBraceBlock(text);
      return block ? parseObject(block) : null;
    }
  },
  {
    name: "repaired",
    run: (text) => parseObject(repairJson(findBraceBlock(text) ?? unwrap(text)))
  }
];

/**
 * Recover a JSON object from free-form model output.
 *
 * Strategies run in order and the first one that yields an object wins:
 * whole text, greedy brace block, repaired brace block. Arrays and scalars
 * do not count as a result.
 */
export function extractJson(text: string, log?: Logger): Record<string, unknown> {
  if (typeof text !== "string" || text.length === 0) {
    return {};
  }

  for (const attempt of ATTEMPTS) {
    let result: Record<string, unknown> | null = null;
    try {
      result = attempt.run(text);
    } catch (err) {
      log?.debug({ attempt: attempt.name, err }, "JSON recovery attempt threw");
      continue;
    }
    if (result) {
      if (attempt.name !== "direct") {
        log?.info({ attempt: attempt.name }, "Recovered JSON from non-JSON model output");
      }
      return result;
    }
  }

  log?.warn({ length: text.length }, "Could not extract valid JSON from model output");
  return {};
}
