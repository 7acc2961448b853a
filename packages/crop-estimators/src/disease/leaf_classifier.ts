import { z } from "zod";
import type { CropTypeV1 } from "@bhoomi/contracts";
import type { LeafImageV1 } from "./leaf_image";

export const LeafClassificationV1Z = z
  .object({
    label: z.string().min(1), // matched against the crop's disease table
    confidence: z.number().finite().min(0).max(1)
  })
  .strict();

export type LeafClassificationV1 = z.infer<typeof LeafClassificationV1Z>;

/** Port for an image classifier. Implementations own feature extraction and model weights. */
export interface LeafClassifier {
  classify(image: LeafImageV1, cropType: CropTypeV1): LeafClassificationV1;
}
