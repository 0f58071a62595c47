// events.ts — MTrk body decoding with running status

import { dataLengthOf } from "./channel";
import { MidiParseError } from "./errors";
import { ByteReader } from "./reader";
import type {
  ChannelData,
  ChannelEvent,
  MetaEvent,
  MidiEvent,
  SysexEvent,
} from "./types";

/**
 * Decodes a complete track body. Running status lives only for the duration
 * of this call, so every track starts without one.
 */
export function parseTrackEvents(
  body: Uint8Array,
  baseOffset: number = 0,
): readonly MidiEvent[] {
  const reader = new ByteReader(body, baseOffset);
  const events: MidiEvent[] = [];
  let runningStatus: number | null = null;

  while (reader.remaining > 0) {
    const delta = reader.readVariableLengthQuantity();
    const lead = reader.peekUint8();

    if (lead === 0xff) {
      reader.readUint8();
      // meta events leave running status alone
      events.push(parseMetaEvent(reader, delta));
    } else if (lead === 0xf0 || lead === 0xf7) {
      reader.readUint8();
      events.push(parseSysexEvent(reader, delta, lead));
      runningStatus = null;
    } else if (lead & 0x80) {
      reader.readUint8();
      events.push(parseChannelEvent(reader, delta, lead));
      runningStatus = lead;
    } else {
      // Data byte in status position: it is the first data byte of a
      // message that reuses the previous status.
      if (runningStatus === null) {
        throw new MidiParseError(
          "MissingRunningStatus",
          "Running status used without previous status",
          reader.position,
        );
      }
      events.push(parseChannelEvent(reader, delta, runningStatus));
    }
  }

  return Object.freeze(events);
}

function parseChannelEvent(
  reader: ByteReader,
  delta: number,
  status: number,
): ChannelEvent {
  const length = dataLengthOf(status);
  if (length === undefined) {
    throw new MidiParseError(
      "UnreachableStatus",
      `No channel message for status 0x${status.toString(16)}`,
      reader.position,
    );
  }

  const first = reader.readUint8();
  const data: ChannelData =
    length === 2 ? [first, reader.readUint8()] : [first];

  return Object.freeze({
    type: "midi",
    delta,
    status,
    data: Object.freeze(data),
  });
}

function parseMetaEvent(reader: ByteReader, delta: number): MetaEvent {
  const kind = reader.readUint8();
  const length = reader.readVariableLengthQuantity();
  const data = reader.readBytes(length);

  return Object.freeze({ type: "meta", delta, kind, data });
}

function parseSysexEvent(
  reader: ByteReader,
  delta: number,
  introducer: number,
): SysexEvent {
  const length = reader.readVariableLengthQuantity();
  const data = reader.readBytes(length);

  return Object.freeze({
    type: "sysex",
    delta,
    start: introducer === 0xf0,
    end: data.length > 0 && data[data.length - 1] === 0xf7,
    data,
  });
}
