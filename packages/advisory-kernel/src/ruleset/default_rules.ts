import type { DecisionRuleV1 } from "./types";

/**
 * Default decision order. Hard overrides first, economics last:
 * nothing to sell, urgent cash, nowhere to store, gain below threshold, else store.
 */
export const DEFAULT_DECISION_RULES_V1: ReadonlyArray<DecisionRuleV1> = Object.freeze([
  {
    rule_id: "zero_yield",
    rule_version: "1.0.0",
    when: { kind: "COMPARE", field: "valuation.predicted_quantity", op: "LTE", rhs: { value: 0 } },
    action: "SELL_NOW",
    template_id: "ZERO_YIELD"
  },
  {
    rule_id: "urgent_cash",
    rule_version: "1.0.0",
    when: { kind: "FLAG_IS", field: "context.urgent_cash_need", value: true },
    action: "SELL_NOW",
    template_id: "URGENT_CASH"
  },
  {
    rule_id: "no_cold_storage",
    rule_version: "1.0.0",
    when: { kind: "FLAG_IS", field: "context.has_cold_storage", value: false },
    action: "SELL_NOW",
    template_id: "NO_COLD_STORAGE"
  },
  {
    rule_id: "insufficient_gain",
    rule_version: "1.0.0",
    when: { kind: "COMPARE", field: "valuation.profit_percentage", op: "LT", rhs: { field: "policy.min_gain_pct" } },
    action: "SELL_NOW",
    template_id: "INSUFFICIENT_GAIN"
  },
  {
    rule_id: "store_for_peak",
    rule_version: "1.0.0",
    when: { kind: "ALWAYS" },
    action: "STORE",
    template_id: "STORE_FOR_PEAK"
  }
]);
