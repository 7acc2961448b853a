import { z } from "zod";
import { parseWithSchema } from "../errors";
import { EstimateMethodV1Z, Fraction01Z, IsoDateZ } from "./common_v1";

const PriceZ = z.number().finite().nonnegative(); // rupees per quintal

export const MarketLevelV1Z = z.enum(["low", "normal", "high"]);
export type MarketLevelV1 = z.infer<typeof MarketLevelV1Z>;

// Qualitative market read supplied by the caller; absent means normal.
export const MarketSignalsV1Z = z
  .object({
    supply: MarketLevelV1Z.optional(),
    demand: MarketLevelV1Z.optional()
  })
  .strict();

export type MarketSignalsV1 = z.infer<typeof MarketSignalsV1Z>;

export const PriceForecastCoreV1Z = z.object({
  current_price: PriceZ,
  predicted_peak_price: PriceZ,
  peak_date: IsoDateZ,
  evaluation_date: IsoDateZ, // the only clock the engine ever sees
  confidence: Fraction01Z,
  method: EstimateMethodV1Z
});

export type PriceForecastCoreV1 = z.infer<typeof PriceForecastCoreV1Z>;

export const PriceForecastV1Z = PriceForecastCoreV1Z.extend({
  months_to_peak: z.number().int().min(0).max(11),
  market_data: z.enum(["observed", "reference"]) // reference: no usable current price was supplied
}).strict();

export type PriceForecastV1 = z.infer<typeof PriceForecastV1Z>;

const PriceForecastCoreCheckedV1Z = PriceForecastCoreV1Z.refine((v) => v.peak_date >= v.evaluation_date, {
  message: "peak_date must not precede evaluation_date",
  path: ["peak_date"]
});

export function parsePriceForecastCoreV1(input: unknown, root = "price_forecast"): PriceForecastCoreV1 {
  return parseWithSchema(PriceForecastCoreCheckedV1Z, input, root);
}
