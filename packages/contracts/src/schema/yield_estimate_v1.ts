import { z } from "zod";
import { parseWithSchema } from "../errors";
import { EstimateMethodV1Z, Fraction01Z } from "./common_v1";
import { ResolvedWeatherV1Z, WeatherAdjustmentV1Z } from "./weather_observation_v1";

const QuantityZ = z.number().finite().nonnegative(); // quintals

// Fields the decision engine reads. Extra fields are stripped on parse.
export const YieldEstimateCoreV1Z = z.object({
  predicted_quantity: QuantityZ,
  base_quantity: QuantityZ,
  weather_factor: z.number().finite().positive(),
  disease_loss_quantity: QuantityZ,
  confidence: Fraction01Z,
  method: EstimateMethodV1Z
});

export type YieldEstimateCoreV1 = z.infer<typeof YieldEstimateCoreV1Z>;

export const YieldEstimateV1Z = YieldEstimateCoreV1Z.extend({
  weather_used: ResolvedWeatherV1Z,
  adjustments: z.array(WeatherAdjustmentV1Z)
}).strict();

export type YieldEstimateV1 = z.infer<typeof YieldEstimateV1Z>;

/**
 * predicted_quantity = max(0, base_quantity * weather_factor - disease_loss_quantity),
 * compared with a relative tolerance so callers may round to cents.
 */
export function yieldInvariantHolds(v: YieldEstimateCoreV1): boolean {
  const gross = v.base_quantity * v.weather_factor;
  const expected = Math.max(0, gross - v.disease_loss_quantity);
  return Math.abs(v.predicted_quantity - expected) <= 1e-6 * Math.max(1, gross) + 0.005;
}

const YieldEstimateCoreCheckedV1Z = YieldEstimateCoreV1Z.refine(yieldInvariantHolds, {
  message: "predicted_quantity must equal max(0, base_quantity * weather_factor - disease_loss_quantity)",
  path: ["predicted_quantity"]
});

export function parseYieldEstimateCoreV1(input: unknown, root = "yield_estimate"): YieldEstimateCoreV1 {
  return parseWithSchema(YieldEstimateCoreCheckedV1Z, input, root);
}
