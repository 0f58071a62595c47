// types.ts — decoded document model. Byte payloads are views into the input.

export interface MidiHeader {
  /** Declared body length of the MThd chunk; 6 in every file seen in practice. */
  readonly length: number;
  readonly format: number;
  readonly trackCount: number;
  /** Raw division word, see `decodeDivision`. */
  readonly division: number;
}

export interface MidiDocument {
  readonly header: MidiHeader;
  readonly chunks: readonly MidiChunk[];
}

export interface TrackChunk {
  readonly type: "track";
  readonly events: readonly MidiEvent[];
}

// Only MTrk is materialized; other chunk tags are dropped while scanning.
export type MidiChunk = TrackChunk;

export type ChannelData = readonly [number, number] | readonly [number];

export interface ChannelEvent {
  readonly type: "midi";
  readonly delta: number;
  /** High nibble is the message type, low nibble the channel. */
  readonly status: number;
  readonly data: ChannelData;
}

export interface MetaEvent {
  readonly type: "meta";
  readonly delta: number;
  readonly kind: number;
  readonly data: Uint8Array;
}

export interface SysexEvent {
  readonly type: "sysex";
  readonly delta: number;
  /** Introduced by 0xF0 (true) or 0xF7 (false). */
  readonly start: boolean;
  /** Last payload byte is 0xF7. */
  readonly end: boolean;
  readonly data: Uint8Array;
}

export type MidiEvent = ChannelEvent | MetaEvent | SysexEvent;

export interface ParseOptions {
  /** Reject chunk tags containing bytes outside printable ASCII. */
  strictTags?: boolean;
}
