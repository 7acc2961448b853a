import { z } from "zod";
import { parseWithSchema } from "../errors";
import { CropTypeV1Z } from "./crop_v1";

export const FarmerContextV1Z = z
  .object({
    has_cold_storage: z.boolean(), // can the farmer physically hold the crop
    urgent_cash_need: z.boolean(), // hard override: always sell now
    crop_type: CropTypeV1Z,
    land_area: z.number().finite().positive() // acres
  })
  .strict();

export type FarmerContextV1 = z.infer<typeof FarmerContextV1Z>;

export function parseFarmerContextV1(input: unknown, root = "context"): FarmerContextV1 {
  return parseWithSchema(FarmerContextV1Z, input, root);
}
