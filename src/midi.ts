// midi.ts — zero-dep Standard MIDI File reader (TypeScript)

import { MidiParseError } from "./errors";
import { parseTrackEvents } from "./events";
import { ByteReader } from "./reader";
import type {
  MidiChunk,
  MidiDocument,
  MidiHeader,
  ParseOptions,
  TrackChunk,
} from "./types";

// 4-byte tag + 4-byte big-endian length
const CHUNK_FRAME_LENGTH = 8;

interface ChunkFrame {
  tag: string;
  length: number;
  /** Offset of the tag's first byte. */
  offset: number;
}

class MidiParser {
  private readonly reader: ByteReader;
  private readonly opts: Required<ParseOptions>;

  constructor(buffer: ArrayBuffer | Uint8Array, options: ParseOptions = {}) {
    const bytes =
      buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
    this.reader = new ByteReader(bytes);
    this.opts = {
      strictTags: options.strictTags ?? false,
    };
  }

  private readChunkFrame(): ChunkFrame {
    const offset = this.reader.position;
    const tag = this.reader.readFourCC();
    const length = this.reader.readUint32();
    return { tag, length, offset };
  }

  private validateTag(frame: ChunkFrame) {
    for (let i = 0; i < frame.tag.length; i++) {
      const code = frame.tag.charCodeAt(i);
      if (code < 0x20 || code > 0x7e) {
        throw new MidiParseError(
          "MalformedTag",
          `Chunk tag byte 0x${code.toString(16)} is not printable ASCII`,
          frame.offset + i,
        );
      }
    }
  }

  private parseHeader(frame: ChunkFrame): MidiHeader {
    const bodyOffset = this.reader.position;
    const body = this.reader.readBytes(frame.length);

    // Fixed fields are the first 6 bytes; anything after them is reserved
    // for extensions and ignored.
    const fields = new ByteReader(body, bodyOffset);
    const format = fields.readUint16();
    const trackCount = fields.readUint16();
    const division = fields.readUint16();

    return Object.freeze({
      length: frame.length,
      format,
      trackCount,
      division,
    });
  }

  private parseTrack(frame: ChunkFrame): TrackChunk {
    const bodyOffset = this.reader.position;
    const body = this.reader.readBytes(frame.length);
    return Object.freeze({
      type: "track",
      events: parseTrackEvents(body, bodyOffset),
    });
  }

  parse(): MidiDocument {
    if (this.reader.remaining < CHUNK_FRAME_LENGTH) {
      throw new MidiParseError(
        "MissingHeader",
        "Invalid MIDI file: missing MThd header",
        this.reader.position,
      );
    }

    const first = this.readChunkFrame();
    if (first.tag !== "MThd") {
      throw new MidiParseError(
        "MissingHeader",
        `Invalid MIDI file: expected MThd, found ${JSON.stringify(first.tag)}`,
        first.offset,
      );
    }
    const header = this.parseHeader(first);

    const chunks: MidiChunk[] = [];
    while (this.reader.remaining > 0) {
      if (this.reader.remaining < CHUNK_FRAME_LENGTH) {
        throw new MidiParseError(
          "TrailingGarbage",
          `${this.reader.remaining} trailing bytes do not form a chunk`,
          this.reader.position,
        );
      }

      const frame = this.readChunkFrame();
      if (this.opts.strictTags) this.validateTag(frame);

      if (frame.tag === "MTrk") {
        chunks.push(this.parseTrack(frame));
      } else {
        // Unknown chunks (and any second MThd) are skipped by length.
        this.reader.readBytes(frame.length);
      }
    }

    return Object.freeze({ header, chunks: Object.freeze(chunks) });
  }
}

export function parseMidi(
  input: ArrayBuffer | Uint8Array,
  opts: ParseOptions = {},
): MidiDocument {
  const parser = new MidiParser(input, opts);
  return parser.parse();
}

export function trackChunks(midi: MidiDocument): TrackChunk[] {
  const tracks: TrackChunk[] = [];
  for (const chunk of midi.chunks) {
    switch (chunk.type) {
      case "track":
        tracks.push(chunk);
        break;
    }
  }
  return tracks;
}
