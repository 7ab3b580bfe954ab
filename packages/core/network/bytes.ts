export type Chunk = Uint8Array | string;

const encoder = new TextEncoder();

export function toU8(chunk: Chunk): Uint8Array {
  if (typeof chunk === "string") return encoder.encode(chunk);
  return chunk;
}

/** Copy `chunks` into one buffer of `total` bytes (defaults to their summed length). */
export function concatBytes(chunks: Uint8Array[], total?: number): Uint8Array {
  const size = total ?? chunks.reduce((n, c) => n + c.byteLength, 0);
  const out = new Uint8Array(size);
  let offset = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

export function utf8ByteLength(text: string): number {
  return encoder.encode(text).byteLength;
}
