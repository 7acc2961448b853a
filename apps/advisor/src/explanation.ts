import { formatRupees } from "@bhoomi/advisory-kernel";
import type { DiseaseAssessmentV1, PriceForecastV1, RecommendationV1, YieldEstimateV1 } from "@bhoomi/contracts";
import type { StorageEconomicsV1 } from "./storage_economics";

export type ExplanationFactsV1 = {
  crop_label: string;
  land_area: number;
  disease: DiseaseAssessmentV1;
  yield: YieldEstimateV1;
  price: PriceForecastV1;
  recommendation: RecommendationV1;
  storage: StorageEconomicsV1;
  storage_months: number;
};

function qtl(v: number): string {
  return `${v.toFixed(2)} quintals`;
}

// One line per step, in pipeline order.
export function explainAdvisoryV1(f: ExplanationFactsV1): string[] {
  const y = f.yield;
  const lines = [
    `Base yield ${qtl(y.base_quantity)} for ${f.land_area.toFixed(2)} acres of ${f.crop_label}.`,
    `Weather factor ${y.weather_factor.toFixed(2)} (${y.method === "model" ? "yield model" : "weather bands"}).`
  ];
  for (const a of y.adjustments) lines.push(`Weather ${a.field} ${a.kind} to ${a.to.toFixed(2)}.`);

  lines.push(
    f.disease.severity === "none"
      ? "No disease detected."
      : `Disease ${f.disease.disease_name ?? "unidentified"} (${f.disease.severity}) costs ${qtl(y.disease_loss_quantity)}.`
  );
  lines.push(`Predicted yield ${qtl(y.predicted_quantity)}.`);
  lines.push(
    `Price ${formatRupees(f.price.current_price)}/quintal today (${f.price.market_data}), forecast ${formatRupees(f.price.predicted_peak_price)} around ${f.price.peak_date}.`
  );
  lines.push(
    `Storage for ${f.storage_months} months costs about ${formatRupees(f.storage.storage_cost_estimate)}, leaving ${formatRupees(f.storage.net_profit_after_storage)} after storage.`
  );
  lines.push(
    `Decision ${f.recommendation.action} (${f.recommendation.rule_id}), confidence ${f.recommendation.confidence_score.toFixed(2)}/100.`
  );
  return lines;
}
