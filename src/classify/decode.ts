/**
 * Percent-decoding that never throws.
 *
 * `decodeURIComponent` rejects malformed input, which attack payloads are
 * full of. Here each run of `%XX` escapes becomes raw bytes decoded as UTF-8
 * (invalid sequences turn into U+FFFD) and anything that is not a valid
 * escape is left as written.
 */

const ESCAPE_RUN = /(?:%[0-9a-fA-F]{2})+/g;

export function percentDecode(text: string): string {
  if (!text.includes("%")) {
    return text;
  }
  return text.replace(ESCAPE_RUN, (run) => {
    const bytes = new Uint8Array(run.length / 3);
    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = parseInt(run.slice(i * 3 + 1, i * 3 + 3), 16);
    }
    return Buffer.from(bytes).toString("utf8");
  });
}

/**
 * Decode repeatedly until the text stops changing or `maxLayers` is reached
 */
export function decodeLayers(text: string, maxLayers: number): string {
  let current = text;
  for (let i = 0; i < maxLayers; i++) {
    const decoded = percentDecode(current);
    if (decoded === current) break;
    current = decoded;
  }
  return current;
}
