import { z } from "zod";

export const RecommendationActionV1Z = z.enum(["STORE", "SELL_NOW"]);
export type RecommendationActionV1 = z.infer<typeof RecommendationActionV1Z>;

export const RecommendationV1Z = z
  .object({
    action: RecommendationActionV1Z,
    reason: z.string().min(1), // always interpolates the computed numbers
    confidence_score: z.number().finite().min(0).max(100),
    current_total_value: z.number().finite().nonnegative(),
    future_total_value: z.number().finite().nonnegative(),
    profit_delta: z.number().finite(),
    profit_percentage: z.number().finite(),
    rule_id: z.string().min(1) // audit only: which ordered rule fired
  })
  .strict();

export type RecommendationV1 = z.infer<typeof RecommendationV1Z>;
