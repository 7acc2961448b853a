export type DecodeReasonV1 = "empty" | "truncated" | "unknown_signature" | "missing_end_marker" | "riff_size_mismatch";

/** Raised for image bytes that cannot be a complete JPEG, PNG or WebP file. */
export class DecodeError extends Error {
  readonly reason: DecodeReasonV1;

  constructor(reason: DecodeReasonV1, detail?: string) {
    super(detail ? `IMAGE_DECODE_FAILED: ${reason}: ${detail}` : `IMAGE_DECODE_FAILED: ${reason}`);
    this.name = "DecodeError";
    this.reason = reason;
  }
}
