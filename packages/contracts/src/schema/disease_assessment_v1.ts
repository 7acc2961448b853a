import { z } from "zod";
import { parseWithSchema } from "../errors";
import { EstimateMethodV1Z, Fraction01Z } from "./common_v1";

export const DiseaseSeverityV1Z = z.enum(["none", "low", "medium", "high"]);
export type DiseaseSeverityV1 = z.infer<typeof DiseaseSeverityV1Z>;

// Farmers can only report an actual disease tier.
export const ReportedSeverityV1Z = z.enum(["low", "medium", "high"]);
export type ReportedSeverityV1 = z.infer<typeof ReportedSeverityV1Z>;

export const DiseaseAssessmentV1Z = z
  .object({
    disease_name: z.string().min(1).nullable(),
    severity: DiseaseSeverityV1Z,
    yield_loss_fraction: Fraction01Z,
    confidence: Fraction01Z,
    method: EstimateMethodV1Z
  })
  .strict()
  .refine((v) => v.severity !== "none" || v.yield_loss_fraction === 0, {
    message: "severity none must carry a zero yield loss",
    path: ["yield_loss_fraction"]
  });

export type DiseaseAssessmentV1 = z.infer<typeof DiseaseAssessmentV1Z>;

export function parseDiseaseAssessmentV1(input: unknown, root = "disease"): DiseaseAssessmentV1 {
  return parseWithSchema(DiseaseAssessmentV1Z, input, root);
}
