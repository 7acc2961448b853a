// Advisory Kernel - Decision rule types (v1)
//
// A rule is data: a condition over the projected DecisionFieldMapV1, the action
// to emit, and the reason template that explains it. Rules are evaluated in
// order; the first match wins.

import type { RecommendationActionV1 } from "@bhoomi/contracts";
import type { DecisionFlagFieldV1, DecisionNumberFieldV1 } from "../inputs/projector";

/**
 * Frozen reason template identifiers.
 */
export const REASON_TEMPLATE_IDS_V1 = Object.freeze([
  "ZERO_YIELD",
  "URGENT_CASH",
  "NO_COLD_STORAGE",
  "INSUFFICIENT_GAIN",
  "STORE_FOR_PEAK"
] as const);

export type ReasonTemplateIdV1 = (typeof REASON_TEMPLATE_IDS_V1)[number];

export type CompareOpV1 = "LT" | "LTE" | "EQ" | "GTE" | "GT";

/** Right-hand side of a comparison: a literal or another numeric field. */
export type NumberOperandV1 = { value: number } | { field: DecisionNumberFieldV1 };

/**
 * Closed condition language. No arithmetic, no text matching.
 */
export type DecisionConditionV1 =
  | { kind: "ALWAYS" }
  | { kind: "FLAG_IS"; field: DecisionFlagFieldV1; value: boolean }
  | { kind: "COMPARE"; field: DecisionNumberFieldV1; op: CompareOpV1; rhs: NumberOperandV1 }
  | { kind: "ALL_OF"; children: ReadonlyArray<DecisionConditionV1> };

export interface DecisionRuleV1 {
  // Stable rule identifier, reported as recommendation.rule_id.
  rule_id: string;

  // SemVer for rule changes.
  rule_version: string;

  when: DecisionConditionV1;

  action: RecommendationActionV1;

  template_id: ReasonTemplateIdV1;
}
