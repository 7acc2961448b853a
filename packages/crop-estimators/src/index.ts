export { DecodeError } from "./disease/decode_error";
export type { DecodeReasonV1 } from "./disease/decode_error";
export { decodeLeafImageV1 } from "./disease/leaf_image";
export type { LeafImageFormatV1, LeafImageV1 } from "./disease/leaf_image";
export { LeafClassificationV1Z } from "./disease/leaf_classifier";
export type { LeafClassificationV1, LeafClassifier } from "./disease/leaf_classifier";
export { DiseaseRequestV1Z, DiseaseSeverityEstimatorV1, ReportedDiseaseV1Z } from "./disease/disease_severity_estimator_v1";
export type { DiseaseEstimatorOptionsV1, DiseaseRequestV1, ReportedDiseaseV1 } from "./disease/disease_severity_estimator_v1";

export { YieldEstimatorV1, bandFactor, weatherFactors } from "./yield/yield_estimator_v1";
export type { WeatherFactorsV1, YieldEstimatorOptionsV1 } from "./yield/yield_estimator_v1";

export { PriceForecasterV1, PriceRequestV1Z, monthsToPeak } from "./price/price_forecaster_v1";
export type { PriceForecasterOptionsV1, PriceRequestV1 } from "./price/price_forecaster_v1";

export { LinearModelDocV1Z, LinearModelV1, ModelLoadError, loadLinearModelV1, parseLinearModelV1 } from "./model/linear_model";
export type { FeatureVectorV1, LinearModelDocV1, ModelTargetV1, RegressionModel } from "./model/linear_model";
