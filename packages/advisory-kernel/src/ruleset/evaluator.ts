// Advisory Kernel - Decision rule evaluator (v1)
//
// Governance checks run before any rule is evaluated:
// - the rule list is non-empty
// - every rule is structurally valid
// - rule ids are unique
// - every template_id is a known reason template
// - each template is used with the action it explains
//
// Evaluation is FIRST_MATCH. A list in which nothing matches is a kernel error.

import { z } from "zod";
import { RecommendationActionV1Z, SemVerZ } from "@bhoomi/contracts";
import type { RecommendationActionV1 } from "@bhoomi/contracts";
import { DECISION_FLAG_FIELDS_V1, DECISION_NUMBER_FIELDS_V1 } from "../inputs/projector";
import type { DecisionFieldMapV1 } from "../inputs/projector";
import { REASON_TEMPLATE_IDS_V1 } from "./types";
import type { CompareOpV1, DecisionConditionV1, DecisionRuleV1, NumberOperandV1, ReasonTemplateIdV1 } from "./types";

const NumberFieldZ = z.enum(DECISION_NUMBER_FIELDS_V1);

const NumberOperandZ = z.union([
  z.object({ value: z.number().finite() }).strict(),
  z.object({ field: NumberFieldZ }).strict()
]);

const DecisionConditionV1Z: z.ZodType<DecisionConditionV1> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("ALWAYS") }).strict(),
    z.object({ kind: z.literal("FLAG_IS"), field: z.enum(DECISION_FLAG_FIELDS_V1), value: z.boolean() }).strict(),
    z
      .object({
        kind: z.literal("COMPARE"),
        field: NumberFieldZ,
        op: z.enum(["LT", "LTE", "EQ", "GTE", "GT"]),
        rhs: NumberOperandZ
      })
      .strict(),
    z.object({ kind: z.literal("ALL_OF"), children: z.array(DecisionConditionV1Z).min(1) }).strict()
  ])
);

const DecisionRuleShapeZ = z
  .object({
    rule_id: z.string().min(1),
    rule_version: SemVerZ,
    when: DecisionConditionV1Z,
    action: RecommendationActionV1Z,
    template_id: z.string().min(1) // membership checked below so the error names the template
  })
  .strict();

/**
 * Each reason template explains exactly one action.
 */
const TEMPLATE_ACTION_V1: Readonly<Record<ReasonTemplateIdV1, RecommendationActionV1>> = Object.freeze({
  ZERO_YIELD: "SELL_NOW",
  URGENT_CASH: "SELL_NOW",
  NO_COLD_STORAGE: "SELL_NOW",
  INSUFFICIENT_GAIN: "SELL_NOW",
  STORE_FOR_PEAK: "STORE"
});

const TEMPLATE_ID_SET_V1: ReadonlySet<string> = new Set<string>(REASON_TEMPLATE_IDS_V1);

export function isReasonTemplateIdV1(id: string): id is ReasonTemplateIdV1 {
  return TEMPLATE_ID_SET_V1.has(id);
}

/**
 * Validates an ordered rule list and returns it frozen.
 * Throws Error with an upper-case code prefix on the first violation.
 */
export function validateDecisionRulesV1(input: unknown): ReadonlyArray<DecisionRuleV1> {
  if (!Array.isArray(input) || input.length === 0) {
    throw new Error("RULESET_EMPTY: at least one decision rule is required");
  }

  const seen = new Set<string>();
  const rules: DecisionRuleV1[] = [];
  input.forEach((raw: unknown, i: number) => {
    const parsed = DecisionRuleShapeZ.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = [`rules[${i}]`, ...(issue?.path ?? []).map((p) => String(p))].join(".");
      throw new Error(`RULE_INVALID: ${where}: ${issue?.message ?? "invalid rule"}`);
    }

    const r = parsed.data;
    if (seen.has(r.rule_id)) throw new Error(`DUPLICATE_RULE_ID: ${r.rule_id}`);
    seen.add(r.rule_id);

    const templateId = r.template_id;
    if (!isReasonTemplateIdV1(templateId)) {
      throw new Error(`UNKNOWN_TEMPLATE_ID: ${templateId} @ rule:${r.rule_id}`);
    }
    if (TEMPLATE_ACTION_V1[templateId] !== r.action) {
      throw new Error(`TEMPLATE_ACTION_MISMATCH: ${templateId} explains ${TEMPLATE_ACTION_V1[templateId]}, rule emits ${r.action} @ rule:${r.rule_id}`);
    }

    rules.push(Object.freeze({ ...r, template_id: templateId }));
  });

  return Object.freeze(rules);
}

function operandValue(fields: DecisionFieldMapV1, rhs: NumberOperandV1): number {
  return "value" in rhs ? rhs.value : fields.numbers[rhs.field];
}

function compare(lhs: number, op: CompareOpV1, rhs: number): boolean {
  switch (op) {
    case "LT":
      return lhs < rhs;
    case "LTE":
      return lhs <= rhs;
    case "EQ":
      return lhs === rhs;
    case "GTE":
      return lhs >= rhs;
    case "GT":
      return lhs > rhs;
    default: {
      // Exhaustiveness guard.
      const _never: never = op;
      throw new Error(`UNREACHABLE_COMPARE_OP: ${String(_never)}`);
    }
  }
}

export function evaluateConditionV1(fields: DecisionFieldMapV1, cond: DecisionConditionV1): boolean {
  switch (cond.kind) {
    case "ALWAYS":
      return true;
    case "FLAG_IS":
      return fields.flags[cond.field] === cond.value;
    case "COMPARE":
      return compare(fields.numbers[cond.field], cond.op, operandValue(fields, cond.rhs));
    case "ALL_OF":
      return cond.children.every((c) => evaluateConditionV1(fields, c));
    default: {
      const _never: never = cond;
      throw new Error(`UNREACHABLE_CONDITION_KIND: ${JSON.stringify(_never)}`);
    }
  }
}

/**
 * FIRST_MATCH over an already validated rule list.
 */
export function selectRuleV1(fields: DecisionFieldMapV1, rules: ReadonlyArray<DecisionRuleV1>): DecisionRuleV1 {
  for (const r of rules) {
    if (evaluateConditionV1(fields, r.when)) return r;
  }
  throw new Error(`NO_RULE_MATCHED: ${rules.map((r) => r.rule_id).join(",")}`);
}
