import { round2 } from "@bhoomi/contracts";
import type { RecommendationV1, StorageSettingsV1 } from "@bhoomi/contracts";

// Informational only; the decision never reads these.
export type StorageEconomicsV1 = {
  storage_cost_estimate: number;
  net_profit_after_storage: number;
  break_even_price: number; // 0 when there is nothing to store
};

export function computeStorageEconomicsV1(
  quantity: number,
  currentPrice: number,
  recommendation: Pick<RecommendationV1, "current_total_value" | "profit_delta">,
  settings: StorageSettingsV1
): StorageEconomicsV1 {
  const cost = ((recommendation.current_total_value * settings.monthly_cost_pct) / 100) * settings.assumed_months;
  return Object.freeze({
    storage_cost_estimate: round2(cost),
    net_profit_after_storage: round2(recommendation.profit_delta - cost),
    break_even_price: quantity > 0 ? round2(currentPrice + cost / quantity) : 0
  });
}

/** 100 x (base - predicted) / base; negative when the weather lifts yield above base. */
export function yieldReductionPct(baseQuantity: number, predictedQuantity: number): number {
  if (baseQuantity <= 0) return 0;
  return round2((100 * (baseQuantity - predictedQuantity)) / baseQuantity);
}
