// Advisory Kernel - Recommendation entrypoint (v1)
//
// recommend() is pure: no IO, no clock, no randomness. The evaluation date
// arrives inside the price forecast.
//
// 1) Parse inputs against the contracts (ValidationError names the field).
// 2) Value the crop now and at the forecast peak.
// 3) Project a DecisionFieldMapV1 and run the ordered rules, first match wins.
// 4) Render the fired rule's reason template and blend the confidences.

import {
  AdvisoryPolicyV1Z,
  parseFarmerContextV1,
  parsePriceForecastCoreV1,
  parseWithSchema,
  parseYieldEstimateCoreV1
} from "@bhoomi/contracts";
import type {
  AdvisoryPolicyV1,
  FarmerContextV1,
  PriceForecastCoreV1,
  RecommendationV1,
  YieldEstimateCoreV1
} from "@bhoomi/contracts";
import { projectDecisionFieldMapV1 } from "./inputs/projector";
import { DEFAULT_ADVISORY_POLICY_V1, blendConfidenceV1 } from "./policy";
import { DEFAULT_DECISION_RULES_V1 } from "./ruleset/default_rules";
import { selectRuleV1, validateDecisionRulesV1 } from "./ruleset/evaluator";
import type { DecisionRuleV1 } from "./ruleset/types";
import { renderReasonV1 } from "./templates/reason_templates";
import { computeValuationV1 } from "./valuation";

export type RecommendOptionsV1 = {
  policy?: AdvisoryPolicyV1;
  rules?: ReadonlyArray<DecisionRuleV1>; // replaces the default order entirely
};

/**
 * STORE vs SELL_NOW for one farmer, one yield estimate and one price forecast.
 *
 * @throws ValidationError for structurally invalid input.
 * @throws Error (RULESET_EMPTY, DUPLICATE_RULE_ID, UNKNOWN_TEMPLATE_ID, NO_RULE_MATCHED, ...) for a bad rule list.
 */
export function recommend(
  context: FarmerContextV1,
  yieldEstimate: YieldEstimateCoreV1,
  priceForecast: PriceForecastCoreV1,
  options: RecommendOptionsV1 = {}
): RecommendationV1 {
  const ctx = parseFarmerContextV1(context);
  const y = parseYieldEstimateCoreV1(yieldEstimate);
  const p = parsePriceForecastCoreV1(priceForecast);
  const policy = options.policy ? parseWithSchema(AdvisoryPolicyV1Z, options.policy, "policy") : DEFAULT_ADVISORY_POLICY_V1;
  const rules = validateDecisionRulesV1(options.rules ?? DEFAULT_DECISION_RULES_V1);

  const valuation = computeValuationV1(y.predicted_quantity, p.current_price, p.predicted_peak_price);
  const fields = projectDecisionFieldMapV1(ctx, y, p, valuation, policy.min_gain_pct);
  const rule = selectRuleV1(fields, rules);

  const reason = renderReasonV1(rule.template_id, {
    quantity: valuation.quantity,
    current_price: valuation.current_price,
    peak_price: valuation.peak_price,
    current_total_value: valuation.current_total_value,
    future_total_value: valuation.future_total_value,
    profit_delta: valuation.profit_delta,
    profit_percentage: valuation.profit_percentage,
    min_gain_pct: policy.min_gain_pct,
    days_to_peak: fields.numbers["forecast.days_to_peak"],
    peak_date: p.peak_date
  });

  // Freeze to prevent accidental mutation by callers.
  return Object.freeze({
    action: rule.action,
    reason,
    confidence_score: blendConfidenceV1(y.confidence, p.confidence, policy),
    current_total_value: valuation.current_total_value,
    future_total_value: valuation.future_total_value,
    profit_delta: valuation.profit_delta,
    profit_percentage: valuation.profit_percentage,
    rule_id: rule.rule_id
  });
}
