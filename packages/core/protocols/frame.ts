import { concatBytes, toU8, type Chunk } from "../network/bytes";

/**
 * Clipboard wire format: a 4-byte big-endian payload length followed by the
 * UTF-8 payload. One frame per connection; no version, type or checksum.
 */
export const HEADER_BYTES = 4;

export type Frame = {
  readonly length: number;
  readonly payload: Uint8Array;
};

const encoder = new TextEncoder();
// Lenient: invalid or truncated sequences become U+FFFD; a leading BOM is kept.
const decoder = new TextDecoder("utf-8", { ignoreBOM: true });

export function encodeFrame(text: string): Frame {
  const payload = encoder.encode(text);
  return Object.freeze({ length: payload.byteLength, payload });
}

export function frameToBytes(frame: Frame): Uint8Array {
  const out = new Uint8Array(HEADER_BYTES + frame.payload.byteLength);
  new DataView(out.buffer).setUint32(0, frame.length, false);
  out.set(frame.payload, HEADER_BYTES);
  return out;
}

export function encodeClipboardText(text: string): Uint8Array {
  return frameToBytes(encodeFrame(text));
}

export function readFrameLength(header: Uint8Array): number {
  return new DataView(header.buffer, header.byteOffset, HEADER_BYTES).getUint32(0, false);
}

/**
 * Read one frame from `source`.
 *
 * Resolves to null when the source ends before the 4 length bytes arrive.
 * When it ends after the header but before the declared length, the bytes
 * received so far are decoded and returned as if complete. Anything past the
 * declared length is ignored.
 */
export async function decodeFrame(source: AsyncIterable<Chunk>): Promise<string | null> {
  const header = new Uint8Array(HEADER_BYTES);
  let headerFilled = 0;
  let expected = -1;
  const parts: Uint8Array[] = [];
  let received = 0;

  for await (const raw of source) {
    let chunk = toU8(raw);
    if (expected < 0) {
      const take = Math.min(HEADER_BYTES - headerFilled, chunk.byteLength);
      header.set(chunk.subarray(0, take), headerFilled);
      headerFilled += take;
      if (headerFilled < HEADER_BYTES) continue;
      expected = readFrameLength(header);
      chunk = chunk.subarray(take);
    }
    const need = expected - received;
    if (need > 0 && chunk.byteLength > 0) {
      const part = chunk.subarray(0, need);
      parts.push(part);
      received += part.byteLength;
    }
    if (received >= expected) break;
  }

  if (expected < 0) return null;
  return decoder.decode(concatBytes(parts, received));
}
