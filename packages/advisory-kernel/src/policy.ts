import { round2 } from "@bhoomi/contracts";
import type { AdvisoryPolicyV1 } from "@bhoomi/contracts";

export const DEFAULT_ADVISORY_POLICY_V1: AdvisoryPolicyV1 = Object.freeze({
  min_gain_pct: 5,
  confidence_weights: Object.freeze({ yield: 0.6, price: 0.4 })
});

/** Weighted mean of the two estimate confidences, as a 0..100 score. */
export function blendConfidenceV1(yieldConfidence: number, priceConfidence: number, policy: AdvisoryPolicyV1): number {
  const w = policy.confidence_weights;
  const score = (100 * (w.yield * yieldConfidence + w.price * priceConfidence)) / (w.yield + w.price);
  return round2(Math.max(0, Math.min(100, score)));
}
