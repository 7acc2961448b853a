import { z } from "zod";
import { Fraction01Z, SemVerZ } from "./common_v1";
import { DiseaseSeverityV1Z } from "./disease_assessment_v1";

// Optimal band [lower, upper]; values inside it earn the in-band bonus.
const BandZ = z
  .tuple([z.number().finite(), z.number().finite()])
  .refine(([lo, hi]) => lo <= hi, { message: "band lower edge must not exceed upper edge" });

const RangeZ = z
  .object({ min: z.number().finite(), max: z.number().finite() })
  .strict()
  .refine((r) => r.min <= r.max, { message: "range min must not exceed max" });

const MonthZ = z.number().int().min(1).max(12);

// Distance outside the band at which a factor reaches its floor.
const ToleranceZ = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("absolute"), value: z.number().positive() }).strict(),
  z.object({ kind: z.literal("relative"), fraction: z.number().positive() }).strict() // fraction of the violated edge
]);

const WeatherResponseZ = z
  .object({
    in_band_factor: z.number().positive(),
    floor: z.number().positive(),
    tolerance: ToleranceZ
  })
  .strict();

const LevelMultipliersZ = z
  .object({ low: z.number().positive(), normal: z.number().positive(), high: z.number().positive() })
  .strict();

export const CropProfileV1Z = z
  .object({
    label: z.string().min(1),
    yield_per_acre: z.number().positive(), // quintals per acre
    optimal: z
      .object({
        temperature_c: BandZ,
        rainfall_mm_annual: BandZ,
        humidity_pct: BandZ
      })
      .strict(),
    climatology: z
      .object({
        rainfall_mm: z.number().finite().nonnegative(), // monthly
        temperature_c: z.number().finite(),
        humidity_pct: z.number().finite().min(0).max(100)
      })
      .strict(),
    reference_price: z.number().positive(), // rupees per quintal, used when no market price is supplied
    peak_months: z.array(MonthZ).min(1),
    seasonal_uplift_fraction: Fraction01Z
  })
  .strict();

export type CropProfileV1 = z.infer<typeof CropProfileV1Z>;

export const DiseaseOutcomeV1Z = z
  .object({
    severity: DiseaseSeverityV1Z,
    yield_loss_fraction: Fraction01Z
  })
  .strict();

export type DiseaseOutcomeV1 = z.infer<typeof DiseaseOutcomeV1Z>;

// Classifier label -> outcome.
const DiseaseTableZ = z.record(z.string().min(1), DiseaseOutcomeV1Z);

export type DiseaseTableV1 = z.infer<typeof DiseaseTableZ>;

export const CropProfilesV1Z = z
  .object({
    paddy: CropProfileV1Z,
    mango: CropProfileV1Z,
    chillies: CropProfileV1Z,
    cotton: CropProfileV1Z,
    turmeric: CropProfileV1Z,
    sugarcane: CropProfileV1Z,
    banana: CropProfileV1Z,
    tomato: CropProfileV1Z,
    okra: CropProfileV1Z,
    brinjal: CropProfileV1Z
  })
  .strict();

export type CropProfilesV1 = z.infer<typeof CropProfilesV1Z>;

export const YieldSettingsV1Z = z
  .object({
    weather_factor_bounds: RangeZ,
    response: z
      .object({
        temperature_c: WeatherResponseZ,
        rainfall_mm: WeatherResponseZ,
        humidity_pct: WeatherResponseZ
      })
      .strict(),
    plausible: z
      .object({
        rainfall_mm: RangeZ,
        temperature_c: RangeZ,
        humidity_pct: RangeZ
      })
      .strict(),
    confidence: z
      .object({
        model: Fraction01Z,
        fallback: Fraction01Z,
        degraded: Fraction01Z // cap when any weather input was defaulted or clamped
      })
      .strict()
  })
  .strict();

export type YieldSettingsV1 = z.infer<typeof YieldSettingsV1Z>;

export const PriceSettingsV1Z = z
  .object({
    horizon_discount: z
      .object({
        per_month: Fraction01Z,
        min_scale: Fraction01Z
      })
      .strict(),
    max_uplift_fraction: z.number().finite().nonnegative(),
    supply_multipliers: LevelMultipliersZ,
    demand_multipliers: LevelMultipliersZ,
    confidence: z
      .object({
        model: Fraction01Z,
        fallback: Fraction01Z,
        no_market_data: Fraction01Z
      })
      .strict()
  })
  .strict();

export type PriceSettingsV1 = z.infer<typeof PriceSettingsV1Z>;

export const DiseaseSettingsV1Z = z
  .object({
    severity_loss_fraction: z
      .object({ low: Fraction01Z, medium: Fraction01Z, high: Fraction01Z })
      .strict(),
    confidence: z
      .object({
        no_image: Fraction01Z,
        reported: Fraction01Z,
        unclassified_image: Fraction01Z
      })
      .strict(),
    unclassified_image: DiseaseOutcomeV1Z, // image supplied but no classifier available
    unknown_label: DiseaseOutcomeV1Z, // classifier label missing from the crop's table
    healthy_labels: z.array(z.string().min(1)).min(1),
    tables: z.object({ default: DiseaseTableZ }).catchall(DiseaseTableZ)
  })
  .strict();

export type DiseaseSettingsV1 = z.infer<typeof DiseaseSettingsV1Z>;

export const AdvisoryPolicyV1Z = z
  .object({
    min_gain_pct: z.number().finite(),
    confidence_weights: z
      .object({
        yield: z.number().finite().nonnegative(),
        price: z.number().finite().nonnegative()
      })
      .strict()
      .refine((w) => w.yield + w.price > 0, { message: "confidence weights must not both be zero" })
  })
  .strict();

export type AdvisoryPolicyV1 = z.infer<typeof AdvisoryPolicyV1Z>;

export const StorageSettingsV1Z = z
  .object({
    monthly_cost_pct: z.number().finite().nonnegative(),
    assumed_months: z.number().finite().nonnegative()
  })
  .strict();

export type StorageSettingsV1 = z.infer<typeof StorageSettingsV1Z>;

export const AdvisoryConfigV1Z = z
  .object({
    type: z.literal("advisory_config_v1"),
    schema_version: SemVerZ,
    policy: AdvisoryPolicyV1Z,
    storage: StorageSettingsV1Z,
    yield: YieldSettingsV1Z,
    price: PriceSettingsV1Z,
    disease: DiseaseSettingsV1Z,
    crops: CropProfilesV1Z
  })
  .strict();

export type AdvisoryConfigV1 = z.infer<typeof AdvisoryConfigV1Z>;
