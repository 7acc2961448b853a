import type { Logger } from "pino";
import { z } from "zod";
import { CropTypeV1Z, IsoDateZ, MarketSignalsV1Z, firstOfMonthAhead, isoDateMonth, parseWithSchema, round2 } from "@bhoomi/contracts";
import type { CropProfilesV1, EstimateMethodV1, MarketSignalsV1, PriceForecastV1, PriceSettingsV1 } from "@bhoomi/contracts";
import type { RegressionModel } from "../model/linear_model";
import { clamp } from "../util";

export const PriceRequestV1Z = z
  .object({
    crop_type: CropTypeV1Z,
    current_price: z.union([z.number(), z.nan()]).nullable().optional(), // unusable values fall back to the reference price
    evaluation_date: IsoDateZ,
    market_signals: MarketSignalsV1Z.nullable().optional()
  })
  .strict();

export type PriceRequestV1 = z.infer<typeof PriceRequestV1Z>;

export type PriceForecasterOptionsV1 = {
  logger: Logger;
  model?: RegressionModel; // predicts the seasonal uplift fraction
};

/** Shortest forward distance in months (0..11) from `month` to any of `peaks`. */
export function monthsToPeak(month: number, peaks: readonly number[]): number {
  let best = 12;
  for (const p of peaks) best = Math.min(best, (((p - month) % 12) + 12) % 12);
  return best;
}

/**
 * Seasonal peak price forecast from a single current market price.
 * peak = current x (1 + uplift), uplift discounted by how far away the peak is.
 */
export class PriceForecasterV1 {
  private readonly settings: PriceSettingsV1;
  private readonly crops: CropProfilesV1;
  private readonly logger: Logger;
  private readonly model: RegressionModel | undefined;

  constructor(settings: PriceSettingsV1, crops: CropProfilesV1, opts: PriceForecasterOptionsV1) {
    this.settings = settings;
    this.crops = crops;
    this.logger = opts.logger;
    this.model = opts.model;
  }

  /** A peak in the current month carries no uplift: predicted_peak_price equals current_price. */
  forecast(input: PriceRequestV1): PriceForecastV1 {
    const req = parseWithSchema(PriceRequestV1Z, input, "price_request");
    const crop = this.crops[req.crop_type];
    const month = isoDateMonth(req.evaluation_date);
    const k = monthsToPeak(month, crop.peak_months);

    const raw = req.current_price;
    const observed = raw != null && Number.isFinite(raw) && raw > 0;
    if (!observed) {
      this.logger.warn({ crop_type: req.crop_type, current_price: raw ?? null }, "no usable market price; using reference price");
    }
    const current = observed ? raw : crop.reference_price;

    let method: EstimateMethodV1 = "fallback";
    let peakPrice = current;
    if (k > 0) {
      let uplift = observed ? this.modelUplift(current, k, month) : null;
      if (uplift !== null) method = "model";
      else uplift = crop.seasonal_uplift_fraction * this.horizonScale(k);

      peakPrice = current * this.peakFactor(uplift, req.market_signals ?? null);
    }

    const c = this.settings.confidence;
    const confidence = observed ? (method === "model" ? c.model : c.fallback) : c.no_market_data;

    return Object.freeze({
      current_price: current,
      predicted_peak_price: round2(peakPrice),
      peak_date: k === 0 ? req.evaluation_date : firstOfMonthAhead(req.evaluation_date, k),
      evaluation_date: req.evaluation_date,
      confidence,
      method,
      months_to_peak: k,
      market_data: observed ? "observed" : "reference"
    });
  }

  private horizonScale(k: number): number {
    const h = this.settings.horizon_discount;
    return Math.max(h.min_scale, 1 - h.per_month * k);
  }

  private peakFactor(uplift: number, signals: MarketSignalsV1 | null): number {
    const supply = this.settings.supply_multipliers[signals?.supply ?? "normal"];
    const demand = this.settings.demand_multipliers[signals?.demand ?? "normal"];
    return Math.min((1 + uplift) * supply * demand, 1 + this.settings.max_uplift_fraction);
  }

  private modelUplift(current: number, k: number, month: number): number | null {
    if (!this.model) return null;
    try {
      const u = this.model.predict({ current_price: current, months_to_peak: k, evaluation_month: month });
      if (Number.isFinite(u)) return clamp(u, 0, this.settings.max_uplift_fraction);
      this.logger.warn({ model_id: this.model.model_id, prediction: u }, "price model output unusable; using seasonal formula");
    } catch (err) {
      this.logger.warn({ model_id: this.model.model_id, err }, "price model failed; using seasonal formula");
    }
    return null;
  }
}
