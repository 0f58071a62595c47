// meta.ts — reading common meta events. The decoder stores kind + raw
// payload; these helpers interpret the payload on request.

import type { MetaEvent, MidiEvent } from "./types";

export const MetaKind = {
  sequenceNumber: 0x00,
  text: 0x01,
  copyright: 0x02,
  trackName: 0x03,
  instrumentName: 0x04,
  lyric: 0x05,
  marker: 0x06,
  cuePoint: 0x07,
  channelPrefix: 0x20,
  endOfTrack: 0x2f,
  setTempo: 0x51,
  smpteOffset: 0x54,
  timeSignature: 0x58,
  keySignature: 0x59,
  sequencerSpecific: 0x7f,
} as const;

export interface TimeSignature {
  numerator: number;
  denominator: number;
  metronome: number;
  thirtySeconds: number;
}

export interface KeySignature {
  /** Positive for sharps, negative for flats. */
  sharpsFlats: number;
  minor: boolean;
}

export function isMetaEvent(event: MidiEvent): event is MetaEvent {
  return event.type === "meta";
}

// 0x01…0x07 text-y types
export function isTextMeta(event: MetaEvent): boolean {
  return event.kind >= MetaKind.text && event.kind <= MetaKind.cuePoint;
}

export function isEndOfTrack(event: MidiEvent): boolean {
  return event.type === "meta" && event.kind === MetaKind.endOfTrack;
}

export function decodeMetaText(
  event: MetaEvent,
  // latin1 never rejects input, so it has to come after the fatal utf-8
  decoders: TextDecoder[] = [
    new TextDecoder("utf-8", { fatal: true }),
    new TextDecoder("latin1"),
  ],
): string {
  for (const dec of decoders) {
    try {
      return dec.decode(event.data);
    } catch {
      continue;
    }
  }
  // Fallback to latin1
  let s = "";
  for (let i = 0; i < event.data.length; i++) {
    s += String.fromCharCode(event.data[i]);
  }
  return s;
}

/** Microseconds per quarter note. */
export function readTempo(event: MetaEvent): number | undefined {
  if (event.kind !== MetaKind.setTempo || event.data.length !== 3) {
    return undefined;
  }
  const [a, b, c] = event.data;
  return (a << 16) | (b << 8) | c;
}

export function readTimeSignature(event: MetaEvent): TimeSignature | undefined {
  if (event.kind !== MetaKind.timeSignature || event.data.length !== 4) {
    return undefined;
  }
  const [numerator, power, metronome, thirtySeconds] = event.data;
  return { numerator, denominator: 1 << power, metronome, thirtySeconds };
}

export function readKeySignature(event: MetaEvent): KeySignature | undefined {
  if (event.kind !== MetaKind.keySignature || event.data.length !== 2) {
    return undefined;
  }
  const [sf, mode] = event.data;
  return {
    sharpsFlats: sf > 127 ? sf - 256 : sf, // signed byte
    minor: mode === 1,
  };
}
