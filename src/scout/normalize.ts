import { decodeLayers } from "../classify/decode.js";

/** Percent-decoding layers peeled per pass */
export const MAX_DECODE_LAYERS = 3;

/** Bound on whole-pass repetitions; every pass that changes text shrinks it */
const MAX_PASSES = 8;

function normalizeOnce(payload: string): string {
  const lowered = payload.toLowerCase().trim();
  return decodeLayers(lowered, MAX_DECODE_LAYERS).replace(/\s+/g, " ").trim();
}

/**
 * Canonical form of a payload for fuzzy duplicate detection: lowercased,
 * percent-decoded until stable, whitespace collapsed to single spaces.
 *
 * Passes repeat until a fixed point so that normalize(normalize(p)) === normalize(p)
 * holds even when decoding surfaces uppercase letters or more escapes.
 */
export function normalizePayload(payload: string): string {
  let current = payload;
  for (let i = 0; i < MAX_PASSES; i++) {
    const next = normalizeOnce(current);
    if (next === current) break;
    current = next;
  }
  return current;
}
