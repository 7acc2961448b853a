import { round2 } from "@bhoomi/contracts";

export type ValuationV1 = {
  quantity: number; // quintals, rounded
  current_price: number;
  peak_price: number;
  current_total_value: number;
  future_total_value: number;
  profit_delta: number;
  profit_percentage: number; // 0 when there is nothing to sell today
};

/**
 * Sell-now vs sell-at-peak value of the same quantity.
 * Computed unrounded, then every figure is rounded to 2 decimals.
 */
export function computeValuationV1(quantity: number, currentPrice: number, peakPrice: number): ValuationV1 {
  const current = quantity * currentPrice;
  const future = quantity * peakPrice;
  const delta = future - current;
  const pct = current > 0 ? (100 * delta) / current : 0;

  return Object.freeze({
    quantity: round2(quantity),
    current_price: round2(currentPrice),
    peak_price: round2(peakPrice),
    current_total_value: round2(current),
    future_total_value: round2(future),
    profit_delta: round2(delta),
    profit_percentage: round2(pct)
  });
}
