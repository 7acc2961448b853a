import { z } from "zod";

/**
 * Supported crops. Every crop has a profile in config/advisory/default.json;
 * the config validator rejects a document that misses one.
 */
export const CROP_TYPES_V1 = Object.freeze([
  "paddy",
  "mango",
  "chillies",
  "cotton",
  "turmeric",
  "sugarcane",
  "banana",
  "tomato",
  "okra",
  "brinjal"
] as const);

export const CropTypeV1Z = z.enum(CROP_TYPES_V1);

export type CropTypeV1 = z.infer<typeof CropTypeV1Z>;

const CROP_TYPE_SET_V1: ReadonlySet<string> = new Set<string>(CROP_TYPES_V1);

export function isCropTypeV1(value: string): value is CropTypeV1 {
  return CROP_TYPE_SET_V1.has(value);
}
