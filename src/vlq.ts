import { MidiParseError } from "./errors";

// MIDI caps delta times and payload lengths at 28 bits.
export const MAX_VLQ_BYTES = 4;
export const MAX_VLQ_VALUE = 0x0fffffff;

export interface VarLength {
  value: number;
  /** Number of encoded bytes consumed. */
  length: number;
}

/**
 * Decodes a big-endian base-128 quantity starting at `offset`.
 * `baseOffset` only shifts the offsets reported in errors.
 */
export function readVarLength(
  bytes: Uint8Array,
  offset: number = 0,
  baseOffset: number = 0,
): VarLength {
  if (!Number.isInteger(offset) || offset < 0 || offset > bytes.length) {
    throw new MidiParseError(
      "UnexpectedEof",
      `VLQ offset ${offset} is outside the input`,
      baseOffset,
    );
  }

  let value = 0;
  for (let i = 0; i < MAX_VLQ_BYTES; i++) {
    const pos = offset + i;
    if (pos >= bytes.length) {
      throw new MidiParseError(
        "UnexpectedEof",
        "Unexpected EOF inside variable-length quantity",
        baseOffset + pos,
      );
    }
    const byte = bytes[pos];
    value = (value << 7) | (byte & 0x7f);
    if ((byte & 0x80) === 0) return { value, length: i + 1 };
  }
  throw new MidiParseError(
    "MalformedVarLength",
    `VLQ too long (over ${MAX_VLQ_BYTES} bytes)`,
    baseOffset + offset,
  );
}
