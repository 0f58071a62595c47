// errors.ts — failure codes raised while decoding a Standard MIDI File

export type ParseErrorCode =
  | "MissingHeader"
  | "MalformedTag"
  | "UnexpectedEof"
  | "MalformedVarLength"
  | "MissingRunningStatus"
  | "UnreachableStatus"
  | "TrailingGarbage";

/**
 * Thrown by every decoding step. `offset` is absolute within the buffer
 * handed to `parseMidi` (or to `parseTrackEvents`, shifted by its base offset).
 */
export class MidiParseError extends Error {
  constructor(
    public readonly code: ParseErrorCode,
    message: string,
    public readonly offset: number,
  ) {
    super(`${message} (at 0x${offset.toString(16)})`);
    this.name = "MidiParseError";
  }
}

export function isMidiParseError(value: unknown): value is MidiParseError {
  return value instanceof MidiParseError;
}
