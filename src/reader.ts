import { MidiParseError } from "./errors";
import { readVarLength } from "./vlq";

/**
 * Forward-only big-endian cursor over a byte range. Reads never cross the
 * end of the range; `readBytes` hands out views, never copies.
 */
export class ByteReader {
  private readonly view: DataView;
  private offset: number = 0;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly baseOffset: number = 0,
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  /** Absolute offset of the next byte, for error reporting. */
  get position(): number {
    return this.baseOffset + this.offset;
  }

  get remaining(): number {
    return this.view.byteLength - this.offset;
  }

  ensureAvailable(n: number) {
    if (n > this.remaining) {
      throw new MidiParseError(
        "UnexpectedEof",
        `Unexpected EOF: need ${n} bytes, ${this.remaining} left`,
        this.position,
      );
    }
  }

  peekUint8(): number {
    this.ensureAvailable(1);
    return this.view.getUint8(this.offset);
  }

  readUint8(): number {
    this.ensureAvailable(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  readUint16(): number {
    this.ensureAvailable(2);
    const value = this.view.getUint16(this.offset, false);
    this.offset += 2;
    return value;
  }

  readUint32(): number {
    this.ensureAvailable(4);
    const value = this.view.getUint32(this.offset, false);
    this.offset += 4;
    return value;
  }

  readBytes(length: number): Uint8Array {
    this.ensureAvailable(length);
    const bytes = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }

  readFourCC(): string {
    const bytes = this.readBytes(4);
    let s = "";
    for (let i = 0; i < 4; i++) s += String.fromCharCode(bytes[i]);
    return s;
  }

  readVariableLengthQuantity(): number {
    const { value, length } = readVarLength(
      this.bytes,
      this.offset,
      this.baseOffset,
    );
    this.offset += length;
    return value;
  }
}
