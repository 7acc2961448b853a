import { DecodeError } from "./decode_error";

export type LeafImageFormatV1 = "jpeg" | "png" | "webp";

export type LeafImageV1 = {
  format: LeafImageFormatV1;
  byte_length: number;
  bytes: Uint8Array;
};

type SignatureV1 = {
  format: LeafImageFormatV1;
  magic: readonly (number | null)[]; // null matches any byte
  min_length: number; // signature plus the smallest trailer the format needs
};

const PNG_TRAILER_LENGTH = 12; // length(4) "IEND"(4) crc(4)
const RIFF_HEADER_LENGTH = 8; // "RIFF" + little-endian size

const SIGNATURES: readonly SignatureV1[] = Object.freeze([
  { format: "jpeg", magic: [0xff, 0xd8, 0xff], min_length: 5 },
  { format: "png", magic: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], min_length: 8 + PNG_TRAILER_LENGTH },
  {
    format: "webp",
    magic: [0x52, 0x49, 0x46, 0x46, null, null, null, null, 0x57, 0x45, 0x42, 0x50], // RIFF....WEBP
    min_length: 12
  }
]);

function matchesPrefix(bytes: Uint8Array, magic: readonly (number | null)[]): boolean {
  const n = Math.min(bytes.length, magic.length);
  for (let i = 0; i < n; i++) {
    const m = magic[i];
    if (m !== null && m !== undefined && bytes[i] !== m) return false;
  }
  return true;
}

function ascii(bytes: Uint8Array, start: number, end: number): string {
  return String.fromCharCode(...bytes.subarray(start, end));
}

function checkTrailer(format: LeafImageFormatV1, bytes: Uint8Array): void {
  const len = bytes.length;
  switch (format) {
    case "jpeg": {
      if (bytes[len - 2] !== 0xff || bytes[len - 1] !== 0xd9) throw new DecodeError("missing_end_marker", "jpeg EOI");
      return;
    }
    case "png": {
      const chunkLength = new DataView(bytes.buffer, bytes.byteOffset + len - PNG_TRAILER_LENGTH, 4).getUint32(0);
      if (chunkLength !== 0 || ascii(bytes, len - 8, len - 4) !== "IEND") {
        throw new DecodeError("missing_end_marker", "png IEND");
      }
      return;
    }
    case "webp": {
      const declared = new DataView(bytes.buffer, bytes.byteOffset + 4, 4).getUint32(0, true);
      if (declared !== len - RIFF_HEADER_LENGTH) {
        throw new DecodeError("riff_size_mismatch", `declared ${declared}, actual ${len - RIFF_HEADER_LENGTH}`);
      }
      return;
    }
    default: {
      const _never: never = format;
      throw new Error(`UNKNOWN_IMAGE_FORMAT: ${String(_never)}`);
    }
  }
}

/**
 * Checks that `bytes` hold a complete JPEG, PNG or WebP container.
 * Pixel data is not decoded; the classifier port owns that.
 */
export function decodeLeafImageV1(bytes: Uint8Array): LeafImageV1 {
  if (bytes.length === 0) throw new DecodeError("empty");

  const sig = SIGNATURES.find((s) => matchesPrefix(bytes, s.magic));
  if (!sig) throw new DecodeError("unknown_signature");
  if (bytes.length < sig.min_length) {
    throw new DecodeError("truncated", `${sig.format} needs at least ${sig.min_length} bytes, got ${bytes.length}`);
  }

  checkTrailer(sig.format, bytes);
  return Object.freeze({ format: sig.format, byte_length: bytes.length, bytes });
}
