import { z } from "zod";
import { parseWithSchema } from "../errors";

export const WEATHER_FIELDS_V1 = Object.freeze(["rainfall_mm", "temperature_c", "humidity_pct"] as const);

export const WeatherFieldV1Z = z.enum(WEATHER_FIELDS_V1);
export type WeatherFieldV1 = z.infer<typeof WeatherFieldV1Z>;

// Sensor readings arrive as NaN/Infinity too; the yield estimator defaults those.
const RawReadingZ = z.union([z.number(), z.nan()]).nullable().optional();

// Raw observation: any field may be absent; no range checks (the yield estimator clamps).
export const WeatherObservationV1Z = z
  .object({
    rainfall_mm: RawReadingZ, // mm per month
    temperature_c: RawReadingZ,
    humidity_pct: RawReadingZ
  })
  .strict();

export type WeatherObservationV1 = z.infer<typeof WeatherObservationV1Z>;

export function parseWeatherObservationV1(input: unknown, root = "weather"): WeatherObservationV1 {
  return parseWithSchema(WeatherObservationV1Z, input, root);
}

// Effective observation after defaulting and clamping.
export const ResolvedWeatherV1Z = z
  .object({
    rainfall_mm: z.number().finite(),
    temperature_c: z.number().finite(),
    humidity_pct: z.number().finite()
  })
  .strict();

export type ResolvedWeatherV1 = z.infer<typeof ResolvedWeatherV1Z>;

export const WeatherAdjustmentV1Z = z
  .object({
    field: WeatherFieldV1Z,
    kind: z.enum(["defaulted", "clamped"]),
    from: z.number().nullable(), // null when the field was missing or non-finite
    to: z.number().finite()
  })
  .strict();

export type WeatherAdjustmentV1 = z.infer<typeof WeatherAdjustmentV1Z>;
