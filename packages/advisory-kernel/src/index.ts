export { recommend } from "./kernel";
export type { RecommendOptionsV1 } from "./kernel";
export { DEFAULT_ADVISORY_POLICY_V1, blendConfidenceV1 } from "./policy";
export { computeValuationV1 } from "./valuation";
export type { ValuationV1 } from "./valuation";
export { DECISION_FLAG_FIELDS_V1, DECISION_NUMBER_FIELDS_V1, projectDecisionFieldMapV1 } from "./inputs/projector";
export type { DecisionFieldMapV1, DecisionFlagFieldV1, DecisionNumberFieldV1 } from "./inputs/projector";
export { REASON_TEMPLATE_IDS_V1 } from "./ruleset/types";
export type { CompareOpV1, DecisionConditionV1, DecisionRuleV1, NumberOperandV1, ReasonTemplateIdV1 } from "./ruleset/types";
export { evaluateConditionV1, isReasonTemplateIdV1, selectRuleV1, validateDecisionRulesV1 } from "./ruleset/evaluator";
export { DEFAULT_DECISION_RULES_V1 } from "./ruleset/default_rules";
export { formatRupees, renderReasonV1 } from "./templates/reason_templates";
export type { ReasonFactsV1 } from "./templates/reason_templates";
