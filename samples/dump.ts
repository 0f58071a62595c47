// samples/dump.ts — print the decoded structure of a .mid file
// usage: npm run sample -- path/to/file.mid
import { readFileSync } from "node:fs";
import * as path from "node:path";
import {
  decodeDivision,
  describeChannelEvent,
  isMidiParseError,
  type MidiDocument,
  parseMidi,
  trackChunks,
} from "../src/index";

function load(midiPath: string): MidiDocument | undefined {
  try {
    return parseMidi(readFileSync(midiPath));
  } catch (err) {
    if (!isMidiParseError(err)) throw err;
    console.error(`${midiPath}: ${err.code}: ${err.message}`);
    return undefined;
  }
}

function main() {
  const arg = process.argv[2];
  if (!arg) {
    console.error("usage: dump <file.mid>");
    process.exitCode = 2;
    return;
  }

  const parsed = load(path.resolve(process.cwd(), arg));
  if (!parsed) {
    process.exitCode = 1;
    return;
  }

  console.log(parsed.header, decodeDivision(parsed.header.division));
  trackChunks(parsed).forEach((track, i) => {
    console.log(`track ${i}: ${track.events.length} events`);
    for (const event of track.events) {
      if (event.type === "midi") {
        console.log(event.delta, describeChannelEvent(event));
      } else {
        console.log(event);
      }
    }
  });
}

main();
