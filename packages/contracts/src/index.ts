export * from "./errors";
export * from "./numeric";
export * from "./schema/common_v1";
export * from "./schema/crop_v1";
export * from "./schema/farmer_context_v1";
export * from "./schema/weather_observation_v1";
export * from "./schema/disease_assessment_v1";
export * from "./schema/yield_estimate_v1";
export * from "./schema/price_forecast_v1";
export * from "./schema/recommendation_v1";
export * from "./schema/advisory_config_v1"; // SSOT shape for config/advisory/default.json
