import type { ChannelEvent } from "./types";

export type ChannelMessageKind =
  | "noteOff"
  | "noteOn"
  | "polyAftertouch"
  | "controlChange"
  | "programChange"
  | "channelPressure"
  | "pitchBend";

const MESSAGE_KINDS: Record<number, ChannelMessageKind> = {
  0x8: "noteOff",
  0x9: "noteOn",
  0xa: "polyAftertouch",
  0xb: "controlChange",
  0xc: "programChange",
  0xd: "channelPressure",
  0xe: "pitchBend",
};

export function messageKindOf(status: number): ChannelMessageKind | undefined {
  return MESSAGE_KINDS[(status & 0xf0) >> 4];
}

/** Data bytes following a channel status; `undefined` outside 0x80..0xEF. */
export function dataLengthOf(status: number): 1 | 2 | undefined {
  switch (messageKindOf(status)) {
    case "programChange":
    case "channelPressure":
      return 1;
    case undefined:
      return undefined;
    default:
      return 2;
  }
}

export function channelOf(event: ChannelEvent): number {
  return event.status & 0x0f;
}

export type ChannelMessage =
  | { kind: "noteOff"; channel: number; note: number; velocity: number }
  | { kind: "noteOn"; channel: number; note: number; velocity: number }
  | { kind: "polyAftertouch"; channel: number; note: number; pressure: number }
  | { kind: "controlChange"; channel: number; controller: number; value: number }
  | { kind: "programChange"; channel: number; program: number }
  | { kind: "channelPressure"; channel: number; pressure: number }
  | { kind: "pitchBend"; channel: number; value: number }; // 14-bit signed center=0

/**
 * Typed view of a decoded channel event. Note-on with velocity 0 is left as
 * noteOn; treating it as a release is up to the caller.
 */
export function describeChannelEvent(
  event: ChannelEvent,
): ChannelMessage | undefined {
  const channel = channelOf(event);
  const first = event.data[0];
  const second = event.data.length === 2 ? event.data[1] : 0;

  switch (messageKindOf(event.status)) {
    case "noteOff":
      return { kind: "noteOff", channel, note: first, velocity: second };
    case "noteOn":
      return { kind: "noteOn", channel, note: first, velocity: second };
    case "polyAftertouch":
      return { kind: "polyAftertouch", channel, note: first, pressure: second };
    case "controlChange":
      return { kind: "controlChange", channel, controller: first, value: second };
    case "programChange":
      return { kind: "programChange", channel, program: first };
    case "channelPressure":
      return { kind: "channelPressure", channel, pressure: first };
    case "pitchBend":
      // lsb first, then msb
      return { kind: "pitchBend", channel, value: ((second << 7) | first) - 8192 };
    case undefined:
      return undefined;
  }
}
