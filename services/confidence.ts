import type { Confidence } from "../types.js";

/**
 * Completeness heuristic, not a correctness check: five wrong attributes
 * with no explicit request still score MEDIUM.
 *
 * With a request list, the share of requested attributes that came back
 * decides (> 0.8 HIGH, > 0.5 MEDIUM). Without one, more than five
 * attributes is MEDIUM.
 */
export function scoreConfidence(
  requested: readonly string[],
  extracted: Record<string, unknown>
): Confidence {
  const extractedCount = Object.keys(extracted).length;

  if (requested.length > 0) {
    const ratio = extractedCount / requested.length;
    if (ratio > 0.8) return "HIGH";
    if (ratio > 0.5) return "MEDIUM";
    return "LOW";
  }

  return extractedCount > 5 ? "MEDIUM" : "LOW";
}
