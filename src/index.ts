export { parseMidi, trackChunks } from "./midi";
export { parseTrackEvents } from "./events";
export { readVarLength, MAX_VLQ_BYTES, MAX_VLQ_VALUE } from "./vlq";
export type { VarLength } from "./vlq";
export { MidiParseError, isMidiParseError } from "./errors";
export type { ParseErrorCode } from "./errors";
export {
  channelOf,
  dataLengthOf,
  describeChannelEvent,
  messageKindOf,
} from "./channel";
export type { ChannelMessage, ChannelMessageKind } from "./channel";
export {
  MetaKind,
  decodeMetaText,
  isEndOfTrack,
  isMetaEvent,
  isTextMeta,
  readKeySignature,
  readTempo,
  readTimeSignature,
} from "./meta";
export type { KeySignature, TimeSignature } from "./meta";
export { decodeDivision } from "./division";
export type { Division } from "./division";
export type {
  ChannelData,
  ChannelEvent,
  MetaEvent,
  MidiChunk,
  MidiDocument,
  MidiEvent,
  MidiHeader,
  ParseOptions,
  SysexEvent,
  TrackChunk,
} from "./types";
