import type { Logger } from "pino";
import {
  WEATHER_FIELDS_V1,
  parseDiseaseAssessmentV1,
  parseFarmerContextV1,
  parseWeatherObservationV1
} from "@bhoomi/contracts";
import type {
  CropProfileV1,
  CropProfilesV1,
  DiseaseAssessmentV1,
  EstimateMethodV1,
  FarmerContextV1,
  ResolvedWeatherV1,
  WeatherAdjustmentV1,
  WeatherObservationV1,
  YieldEstimateV1,
  YieldSettingsV1
} from "@bhoomi/contracts";
import type { RegressionModel } from "../model/linear_model";
import { clamp, freezeDeep } from "../util";

type WeatherResponseV1 = YieldSettingsV1["response"]["temperature_c"];

export type YieldEstimatorOptionsV1 = {
  logger: Logger;
  model?: RegressionModel; // predicts weather-adjusted yield per acre
};

export type WeatherFactorsV1 = {
  temperature_c: number;
  rainfall_mm: number;
  humidity_pct: number;
};

/**
 * Response of one weather variable to its optimal band [lo, hi].
 * In band: in_band_factor. Outside: linear from in_band_factor at the edge down
 * to floor at `tolerance` away from it, then flat.
 */
export function bandFactor(value: number, band: readonly [number, number], response: WeatherResponseV1): number {
  const [lo, hi] = band;
  if (value >= lo && value <= hi) return response.in_band_factor;

  const edge = value < lo ? lo : hi;
  const reach =
    response.tolerance.kind === "absolute" ? response.tolerance.value : response.tolerance.fraction * Math.abs(edge);
  const distance = Math.abs(value - edge);
  if (distance >= reach) return response.floor;

  return response.in_band_factor - (response.in_band_factor - response.floor) * (distance / reach);
}

export function weatherFactors(w: ResolvedWeatherV1, crop: CropProfileV1, settings: YieldSettingsV1): WeatherFactorsV1 {
  return {
    temperature_c: bandFactor(w.temperature_c, crop.optimal.temperature_c, settings.response.temperature_c),
    rainfall_mm: bandFactor(w.rainfall_mm * 12, crop.optimal.rainfall_mm_annual, settings.response.rainfall_mm), // annualised
    humidity_pct: bandFactor(w.humidity_pct, crop.optimal.humidity_pct, settings.response.humidity_pct)
  };
}

/**
 * Yield = crop base x weather factor, less the disease loss.
 * Weather readings are repaired (defaulted or clamped), never rejected.
 */
export class YieldEstimatorV1 {
  private readonly settings: YieldSettingsV1;
  private readonly crops: CropProfilesV1;
  private readonly logger: Logger;
  private readonly model: RegressionModel | undefined;

  constructor(settings: YieldSettingsV1, crops: CropProfilesV1, opts: YieldEstimatorOptionsV1) {
    this.settings = settings;
    this.crops = crops;
    this.logger = opts.logger;
    this.model = opts.model;
  }

  estimate(contextIn: FarmerContextV1, weatherIn: WeatherObservationV1, diseaseIn: DiseaseAssessmentV1): YieldEstimateV1 {
    const context = parseFarmerContextV1(contextIn);
    const weather = parseWeatherObservationV1(weatherIn);
    const disease = parseDiseaseAssessmentV1(diseaseIn);

    const crop = this.crops[context.crop_type];
    const { resolved, adjustments } = this.resolveWeather(weather, crop, context.crop_type);

    const base = crop.yield_per_acre * context.land_area;
    const bounds = this.settings.weather_factor_bounds;

    let method: EstimateMethodV1 = "fallback";
    let weatherFactor = 0;
    const modelled = this.modelFactor(context, resolved, crop);
    if (modelled !== null) {
      method = "model";
      weatherFactor = modelled;
    } else {
      const f = weatherFactors(resolved, crop, this.settings);
      weatherFactor = clamp((f.temperature_c + f.rainfall_mm + f.humidity_pct) / 3, bounds.min, bounds.max);
    }

    const gross = base * weatherFactor;
    const diseaseLoss = gross * disease.yield_loss_fraction;
    const predicted = Math.max(0, gross - diseaseLoss);

    let confidence = method === "model" ? this.settings.confidence.model : this.settings.confidence.fallback;
    if (adjustments.length > 0) confidence = Math.min(confidence, this.settings.confidence.degraded);

    return freezeDeep({
      predicted_quantity: predicted,
      base_quantity: base,
      weather_factor: weatherFactor,
      disease_loss_quantity: diseaseLoss,
      confidence,
      method,
      weather_used: resolved,
      adjustments
    });
  }

  private resolveWeather(
    weather: WeatherObservationV1,
    crop: CropProfileV1,
    cropType: string
  ): { resolved: ResolvedWeatherV1; adjustments: WeatherAdjustmentV1[] } {
    const resolved: ResolvedWeatherV1 = { ...crop.climatology };
    const adjustments: WeatherAdjustmentV1[] = [];

    for (const field of WEATHER_FIELDS_V1) {
      const raw = weather[field];
      const range = this.settings.plausible[field];

      if (raw == null || !Number.isFinite(raw)) {
        adjustments.push({ field, kind: "defaulted", from: null, to: crop.climatology[field] });
        this.logger.warn({ crop_type: cropType, field, to: crop.climatology[field] }, "weather reading missing; using climatology");
        continue;
      }

      const v = clamp(raw, range.min, range.max);
      if (v !== raw) {
        adjustments.push({ field, kind: "clamped", from: raw, to: v });
        this.logger.warn({ crop_type: cropType, field, from: raw, to: v }, "weather reading outside plausible range; clamped");
      }
      resolved[field] = v;
    }

    return { resolved, adjustments };
  }

  private modelFactor(context: FarmerContextV1, w: ResolvedWeatherV1, crop: CropProfileV1): number | null {
    if (!this.model) return null;
    const bounds = this.settings.weather_factor_bounds;
    try {
      const perAcre = this.model.predict({
        land_area: context.land_area,
        rainfall_mm: w.rainfall_mm,
        temperature_c: w.temperature_c,
        humidity_pct: w.humidity_pct
      });
      if (Number.isFinite(perAcre) && perAcre > 0) return clamp(perAcre / crop.yield_per_acre, bounds.min, bounds.max);
      this.logger.warn({ model_id: this.model.model_id, prediction: perAcre }, "yield model output unusable; using formula");
    } catch (err) {
      this.logger.warn({ model_id: this.model.model_id, err }, "yield model failed; using formula");
    }
    return null;
  }
}
