export type Division =
  | { kind: "ppq"; ticksPerQuarter: number }
  | { kind: "smpte"; fps: number; ticksPerFrame: number };

/**
 * Splits the MThd division word. With bit 15 set the high byte is a negative
 * frame rate (-24, -25, -29, -30) and the low byte ticks per frame.
 */
export function decodeDivision(division: number): Division {
  if (division & 0x8000) {
    const fpsRaw = (division >> 8) & 0xff;
    const fps = fpsRaw > 127 ? fpsRaw - 256 : fpsRaw; // Convert to signed byte
    return { kind: "smpte", fps: Math.abs(fps), ticksPerFrame: division & 0xff };
  }
  return { kind: "ppq", ticksPerQuarter: division };
}
