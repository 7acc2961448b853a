import { z } from "zod";
import {
  CropTypeV1Z,
  FarmerContextV1Z,
  IsoDateZ,
  MarketSignalsV1Z,
  WeatherObservationV1Z,
  parseWithSchema
} from "@bhoomi/contracts";
import type { CropTypeV1, IsoDate } from "@bhoomi/contracts";
import { ReportedDiseaseV1Z } from "@bhoomi/crop-estimators";

export const PriceObservationV1Z = z
  .object({
    crop_type: CropTypeV1Z,
    date: IsoDateZ,
    price: z.number().finite() // rupees per quintal; non-positive values fall back to the reference price
  })
  .strict();

export type PriceObservationV1 = z.infer<typeof PriceObservationV1Z>;

// One farmer's request, as posted by a client or read from a file.
export const SubmissionV1Z = z
  .object({
    context: FarmerContextV1Z,
    weather: WeatherObservationV1Z.nullable().optional(),
    market_prices: z.array(PriceObservationV1Z).optional(),
    market_signals: MarketSignalsV1Z.nullable().optional(),
    image_base64: z
      .string()
      .regex(/^[A-Za-z0-9+/]*={0,2}$/, "expected base64")
      .nullable()
      .optional(),
    reported_disease: ReportedDiseaseV1Z.nullable().optional(),
    evaluation_date: IsoDateZ
  })
  .strict();

export type SubmissionV1 = z.infer<typeof SubmissionV1Z>;

export function parseSubmissionV1(input: unknown, root = "submission"): SubmissionV1 {
  return parseWithSchema(SubmissionV1Z, input, root);
}

/**
 * Latest observation for `crop` dated on or before `evaluationDate`.
 * Same-day entries: the later one in the list wins.
 */
export function resolveCurrentPrice(
  observations: readonly PriceObservationV1[],
  crop: CropTypeV1,
  evaluationDate: IsoDate
): PriceObservationV1 | null {
  let best: PriceObservationV1 | null = null;
  for (const o of observations) {
    if (o.crop_type !== crop || o.date > evaluationDate) continue;
    if (best === null || o.date >= best.date) best = o;
  }
  return best;
}
