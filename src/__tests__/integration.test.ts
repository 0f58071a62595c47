import { beforeAll, describe, expect, it } from "vitest";
import {
  decodeDivision,
  decodeMetaText,
  describeChannelEvent,
  isEndOfTrack,
  type MidiDocument,
  MetaKind,
  parseMidi,
  readTempo,
  readTimeSignature,
  trackChunks,
} from "../index";
import {
  chunk,
  createTempoEvent,
  END_OF_TRACK,
  headerChunk,
  metaEvent,
} from "./test-utils";

/**
 * Notes with absolute tick positions, accumulated per track
 */
function extractNoteEvents(midi: MidiDocument) {
  const notes: Array<{
    track: number;
    absoluteTick: number;
    kind: "noteOn" | "noteOff";
    note: number;
    velocity: number;
  }> = [];

  trackChunks(midi).forEach((track, trackIndex) => {
    let absoluteTick = 0;
    for (const event of track.events) {
      absoluteTick += event.delta;
      if (event.type !== "midi") continue;

      const message = describeChannelEvent(event);
      if (message?.kind === "noteOn" || message?.kind === "noteOff") {
        notes.push({
          track: trackIndex,
          absoluteTick,
          kind: message.kind,
          note: message.note,
          velocity: message.velocity,
        });
      }
    }
  });

  return notes;
}

describe("Integration Tests", () => {
  let midi: MidiDocument;

  beforeAll(() => {
    const conductor = [
      ...metaEvent(0, MetaKind.trackName, [0x53, 0x6f, 0x6e, 0x67]), // "Song"
      ...metaEvent(0, MetaKind.timeSignature, [3, 2, 24, 8]),
      ...metaEvent(0, MetaKind.setTempo, createTempoEvent(600000)),
      ...metaEvent(1440, MetaKind.setTempo, createTempoEvent(500000)),
      ...END_OF_TRACK,
    ];

    const piano = [
      // GM system on
      0x00, 0xf0, 0x05, 0x7e, 0x7f, 0x09, 0x01, 0xf7,
      0x00, 0xc0, 0x00, // program 0
      0x00, 0x90, 0x3c, 0x50, // C4 on
      0x00, 0x40, 0x50, // E4 on, running status
      0x83, 0x60, 0x3c, 0x00, // C4 released after 480 ticks
      0x00, 0x40, 0x00, // E4 released
      ...END_OF_TRACK,
    ];

    const bass = [
      0x00, 0xc1, 0x20,
      0x00, 0x91, 0x24, 0x64,
      0x87, 0x40, 0x81, 0x24, 0x40, // note off after 960 ticks
      0x00, 0xe1, 0x00, 0x40, // pitch bend center
      ...END_OF_TRACK,
    ];

    midi = parseMidi(
      new Uint8Array([
        ...headerChunk({ format: 1, tracks: 3, division: 480 }),
        ...chunk("MTrk", conductor),
        ...chunk("XVND", [0x01, 0x02, 0x03, 0x04]),
        ...chunk("MTrk", piano),
        ...chunk("MTrk", bass),
      ]),
    );
  });

  describe("File Structure Validation", () => {
    it("should read the header", () => {
      expect(midi.header).toEqual({
        length: 6,
        format: 1,
        trackCount: 3,
        division: 480,
      });
      expect(decodeDivision(midi.header.division)).toEqual({
        kind: "ppq",
        ticksPerQuarter: 480,
      });
    });

    it("should drop the vendor chunk and keep three tracks", () => {
      expect(midi.chunks).toHaveLength(3);
    });

    it("should have properly terminated tracks", () => {
      for (const track of trackChunks(midi)) {
        expect(isEndOfTrack(track.events[track.events.length - 1])).toBe(true);
      }
    });
  });

  describe("Conductor Track", () => {
    it("should expose the track name and time signature", () => {
      const [name, timeSig] = midi.chunks[0].events;
      if (name.type !== "meta" || timeSig.type !== "meta") {
        throw new Error("expected meta events");
      }
      expect(decodeMetaText(name)).toBe("Song");
      expect(readTimeSignature(timeSig)).toEqual({
        numerator: 3,
        denominator: 4,
        metronome: 24,
        thirtySeconds: 8,
      });
    });

    it("should place tempo changes at absolute ticks", () => {
      const tempos: Array<[number, number]> = [];
      let tick = 0;
      for (const event of midi.chunks[0].events) {
        tick += event.delta;
        if (event.type !== "meta") continue;
        const tempo = readTempo(event);
        if (tempo !== undefined) tempos.push([tick, tempo]);
      }

      expect(tempos).toEqual([
        [0, 600000],
        [1440, 500000],
      ]);
    });
  });

  describe("Music Data Analysis", () => {
    it("should extract note events across tracks", () => {
      expect(extractNoteEvents(midi)).toEqual([
        { track: 1, absoluteTick: 0, kind: "noteOn", note: 0x3c, velocity: 0x50 },
        { track: 1, absoluteTick: 0, kind: "noteOn", note: 0x40, velocity: 0x50 },
        { track: 1, absoluteTick: 480, kind: "noteOn", note: 0x3c, velocity: 0 },
        { track: 1, absoluteTick: 480, kind: "noteOn", note: 0x40, velocity: 0 },
        { track: 2, absoluteTick: 0, kind: "noteOn", note: 0x24, velocity: 0x64 },
        { track: 2, absoluteTick: 960, kind: "noteOff", note: 0x24, velocity: 0x40 },
      ]);
    });

    it("should keep the sysex message intact", () => {
      const sysex = midi.chunks[1].events[0];
      expect(sysex.type).toBe("sysex");
      if (sysex.type === "sysex") {
        expect(sysex.start).toBe(true);
        expect(sysex.end).toBe(true);
        expect(Array.from(sysex.data)).toEqual([0x7e, 0x7f, 0x09, 0x01, 0xf7]);
      }
    });

    it("should decode the pitch bend", () => {
      const events = midi.chunks[2].events;
      const bend = events[events.length - 2];
      if (bend.type !== "midi") throw new Error("expected channel event");
      expect(describeChannelEvent(bend)).toEqual({
        kind: "pitchBend",
        channel: 1,
        value: 0,
      });
    });
  });
});
