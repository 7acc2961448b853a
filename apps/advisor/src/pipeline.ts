// apps/advisor/src/pipeline.ts
//
// One submission end to end: Disease -> Yield, Price, then the decision kernel.
// The kernel only ever sees the evaluation date carried by the submission.

import type { Logger } from "pino";
import { recommend } from "@bhoomi/advisory-kernel";
import type { DecisionRuleV1 } from "@bhoomi/advisory-kernel";
import { round2 } from "@bhoomi/contracts";
import type { DiseaseAssessmentV1, PriceForecastV1, RecommendationV1, YieldEstimateV1 } from "@bhoomi/contracts";
import { DecodeError, DiseaseSeverityEstimatorV1, PriceForecasterV1, YieldEstimatorV1 } from "@bhoomi/crop-estimators";
import type { DiseaseRequestV1, LeafClassifier, RegressionModel } from "@bhoomi/crop-estimators";
import type { LoadedAdvisoryConfigV1 } from "./config/ssot";
import { explainAdvisoryV1 } from "./explanation";
import { computeStorageEconomicsV1, yieldReductionPct } from "./storage_economics";
import type { StorageEconomicsV1 } from "./storage_economics";
import { parseSubmissionV1, resolveCurrentPrice } from "./submission";
import type { SubmissionV1 } from "./submission";

export type AdvisoryReportV1 = {
  disease: DiseaseAssessmentV1;
  yield: YieldEstimateV1;
  price: PriceForecastV1;
  recommendation: RecommendationV1;
  storage: StorageEconomicsV1;
  yield_reduction_pct: number;
  explanation: string[];
  config_hash: string;
};

export type AdvisoryPipelineOptionsV1 = {
  logger: Logger;
  classifier?: LeafClassifier;
  yieldModel?: RegressionModel;
  priceModel?: RegressionModel;
  rules?: ReadonlyArray<DecisionRuleV1>;
};

export class AdvisoryPipelineV1 {
  private readonly loaded: LoadedAdvisoryConfigV1;
  private readonly logger: Logger;
  private readonly rules: ReadonlyArray<DecisionRuleV1> | undefined;
  private readonly disease: DiseaseSeverityEstimatorV1;
  private readonly yieldEstimator: YieldEstimatorV1;
  private readonly priceForecaster: PriceForecasterV1;

  constructor(loaded: LoadedAdvisoryConfigV1, opts: AdvisoryPipelineOptionsV1) {
    const cfg = loaded.config;
    this.loaded = loaded;
    this.logger = opts.logger;
    this.rules = opts.rules;
    this.disease = new DiseaseSeverityEstimatorV1(cfg.disease, { logger: opts.logger, classifier: opts.classifier });
    this.yieldEstimator = new YieldEstimatorV1(cfg.yield, cfg.crops, { logger: opts.logger, model: opts.yieldModel });
    this.priceForecaster = new PriceForecasterV1(cfg.price, cfg.crops, { logger: opts.logger, model: opts.priceModel });
  }

  /** @throws ValidationError for a malformed submission. */
  run(input: unknown): AdvisoryReportV1 {
    const sub = parseSubmissionV1(input);
    const cfg = this.loaded.config;
    const ctx = sub.context;

    const disease = this.assessDisease(sub);
    const yieldEstimate = this.yieldEstimator.estimate(ctx, sub.weather ?? {}, disease);

    const observed = resolveCurrentPrice(sub.market_prices ?? [], ctx.crop_type, sub.evaluation_date);
    const price = this.priceForecaster.forecast({
      crop_type: ctx.crop_type,
      current_price: observed ? observed.price : null,
      evaluation_date: sub.evaluation_date,
      market_signals: sub.market_signals ?? null
    });

    const recommendation = recommend(ctx, yieldEstimate, price, { policy: cfg.policy, rules: this.rules });
    const storage = computeStorageEconomicsV1(
      round2(yieldEstimate.predicted_quantity),
      price.current_price,
      recommendation,
      cfg.storage
    );

    const explanation = explainAdvisoryV1({
      crop_label: cfg.crops[ctx.crop_type].label,
      land_area: ctx.land_area,
      disease,
      yield: yieldEstimate,
      price,
      recommendation,
      storage,
      storage_months: cfg.storage.assumed_months
    });

    this.logger.info(
      {
        crop_type: ctx.crop_type,
        evaluation_date: sub.evaluation_date,
        action: recommendation.action,
        rule_id: recommendation.rule_id,
        confidence_score: recommendation.confidence_score,
        config_hash: this.loaded.config_hash
      },
      "advisory run complete"
    );

    return Object.freeze({
      disease,
      yield: yieldEstimate,
      price,
      recommendation,
      storage,
      yield_reduction_pct: yieldReductionPct(yieldEstimate.base_quantity, yieldEstimate.predicted_quantity),
      explanation,
      config_hash: this.loaded.config_hash
    });
  }

  // A corrupt photo degrades to "no image"; the farmer's report still counts.
  private assessDisease(sub: SubmissionV1): DiseaseAssessmentV1 {
    const req: DiseaseRequestV1 = {
      crop_type: sub.context.crop_type,
      image: sub.image_base64 ? Buffer.from(sub.image_base64, "base64") : null,
      reported: sub.reported_disease ?? null
    };
    try {
      return this.disease.assess(req);
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      this.logger.warn({ crop_type: req.crop_type, reason: err.reason }, "leaf image could not be decoded; assessing without it");
      return this.disease.assess({ ...req, image: null });
    }
  }
}
