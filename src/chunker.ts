import { MAX_CHARACTER_STRING_BYTES, MAX_CHUNK_BYTES, MAX_TOTAL_BYTES } from "./constants";
import type { ChunkSet } from "./types";

const textDecoder = new TextDecoder();
const textEncoder = new TextEncoder();

function isContinuationByte(byte: number) {
  return (byte & 0xc0) === 0x80;
}

/**
 * Moves `offset` back until it sits on the first byte of a code point.
 * Offsets at or past the end of `bytes` are returned unchanged.
 */
function boundaryAtOrBefore(bytes: Uint8Array, offset: number): number {
  let cut = offset;
  while (cut > 0 && cut < bytes.length && isContinuationByte(bytes[cut])) {
    cut--;
  }
  return cut;
}

export function byteLength(text: string): number {
  return textEncoder.encode(text).length;
}

/**
 * Splits `text` into UTF-8 slices that each fit a TXT character-string.
 *
 * The encoded text is first cut to `maxTotalBytes`, then sliced every
 * `maxChunkBytes`; both cuts only ever land on a code point start. The result
 * always holds at least one element, so an empty answer still carries one
 * empty character-string.
 */
export function chunk(
  text: string,
  maxChunkBytes = MAX_CHUNK_BYTES,
  maxTotalBytes = MAX_TOTAL_BYTES,
): ChunkSet {
  if (
    !Number.isInteger(maxChunkBytes) ||
    maxChunkBytes < 1 ||
    maxChunkBytes > MAX_CHARACTER_STRING_BYTES
  ) {
    throw new RangeError(
      `maxChunkBytes must be an integer between 1 and ${MAX_CHARACTER_STRING_BYTES}, got ${maxChunkBytes}`,
    );
  }
  if (!Number.isInteger(maxTotalBytes) || maxTotalBytes < 0) {
    throw new RangeError(`maxTotalBytes must be a non-negative integer, got ${maxTotalBytes}`);
  }

  const bytes = textEncoder.encode(text);
  const end = bytes.length > maxTotalBytes ? boundaryAtOrBefore(bytes, maxTotalBytes) : bytes.length;
  if (end === 0) {
    return [new Uint8Array(0)];
  }

  const chunks: Uint8Array[] = [];
  let offset = 0;
  while (offset < end) {
    let cut = Math.min(offset + maxChunkBytes, end);
    if (cut < end) {
      cut = boundaryAtOrBefore(bytes, cut);
    }
    if (cut === offset) {
      throw new RangeError(
        `A code point at byte ${offset} does not fit in ${maxChunkBytes}-byte chunks`,
      );
    }
    chunks.push(bytes.slice(offset, cut));
    offset = cut;
  }
  return chunks;
}

export function dechunk(chunks: ChunkSet): string {
  const total = chunks.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of chunks) {
    out.set(part, offset);
    offset += part.length;
  }
  return textDecoder.decode(out);
}
