// Advisory Kernel - Decision field projector (v1)
//
// Rules never see the raw estimates. They read a fixed set of named fields,
// projected here from the parsed inputs and the rounded valuation.
// The quantity is the unrounded estimate, so only a true zero yield reads as 0.

import type { FarmerContextV1, PriceForecastCoreV1, YieldEstimateCoreV1 } from "@bhoomi/contracts";
import { daysBetweenIsoDates } from "@bhoomi/contracts";
import type { ValuationV1 } from "../valuation";

export const DECISION_FLAG_FIELDS_V1 = Object.freeze(["context.urgent_cash_need", "context.has_cold_storage"] as const);

export type DecisionFlagFieldV1 = (typeof DECISION_FLAG_FIELDS_V1)[number];

export const DECISION_NUMBER_FIELDS_V1 = Object.freeze([
  "valuation.predicted_quantity",
  "valuation.current_total_value",
  "valuation.future_total_value",
  "valuation.profit_delta",
  "valuation.profit_percentage",
  "forecast.days_to_peak",
  "estimate.yield_confidence",
  "estimate.price_confidence",
  "policy.min_gain_pct"
] as const);

export type DecisionNumberFieldV1 = (typeof DECISION_NUMBER_FIELDS_V1)[number];

/**
 * The only structure decision rules are allowed to read.
 */
export interface DecisionFieldMapV1 {
  flags: Readonly<Record<DecisionFlagFieldV1, boolean>>;
  numbers: Readonly<Record<DecisionNumberFieldV1, number>>;
}

export function projectDecisionFieldMapV1(
  context: FarmerContextV1,
  yieldEstimate: YieldEstimateCoreV1,
  priceForecast: PriceForecastCoreV1,
  valuation: ValuationV1,
  minGainPct: number
): DecisionFieldMapV1 {
  return Object.freeze({
    flags: Object.freeze({
      "context.urgent_cash_need": context.urgent_cash_need,
      "context.has_cold_storage": context.has_cold_storage
    }),
    numbers: Object.freeze({
      "valuation.predicted_quantity": yieldEstimate.predicted_quantity,
      "valuation.current_total_value": valuation.current_total_value,
      "valuation.future_total_value": valuation.future_total_value,
      "valuation.profit_delta": valuation.profit_delta,
      "valuation.profit_percentage": valuation.profit_percentage,
      "forecast.days_to_peak": daysBetweenIsoDates(priceForecast.evaluation_date, priceForecast.peak_date),
      "estimate.yield_confidence": yieldEstimate.confidence,
      "estimate.price_confidence": priceForecast.confidence,
      "policy.min_gain_pct": minGainPct
    })
  });
}
