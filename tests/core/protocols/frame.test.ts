import {
  decodeFrame,
  encodeClipboardText,
  encodeFrame,
  frameToBytes,
  readFrameLength,
} from "../../../packages/core/protocols/frame";

async function* chunks(...parts: Array<number[] | Uint8Array | string>) {
  for (const p of parts) {
    yield Array.isArray(p) ? Uint8Array.from(p) : p;
  }
}

describe("frame encoding", () => {
  test("prefixes the UTF-8 payload with a big-endian length", () => {
    const frame = encodeFrame("hello");
    expect(frame.length).toBe(5);
    expect(Array.from(frameToBytes(frame))).toEqual([0, 0, 0, 5, 104, 101, 108, 108, 111]);
  });

  test("empty text is a header-only frame", () => {
    const frame = encodeFrame("");
    expect(frame.length).toBe(0);
    expect(Array.from(encodeClipboardText(""))).toEqual([0, 0, 0, 0]);
  });

  test("length counts bytes, not characters", () => {
    expect(encodeFrame("héllo").length).toBe(6);
    expect(encodeFrame("📋").length).toBe(4);
  });

  test("frames are immutable", () => {
    expect(Object.isFrozen(encodeFrame("x"))).toBe(true);
  });

  test("reads lengths above 2^31 as unsigned", () => {
    expect(readFrameLength(Uint8Array.from([0x80, 0, 0, 1]))).toBe(2147483649);
  });
});

describe("frame decoding", () => {
  test.each(["hello", "", "multi\nline\r\ntext", "naïve café 📋", "\uFEFFbom first"])(
    "round-trips %j",
    async (text) => {
      await expect(decodeFrame(chunks(encodeClipboardText(text)))).resolves.toBe(text);
    }
  );

  test("reassembles a header split across chunks", async () => {
    await expect(decodeFrame(chunks([0, 0], [0, 3, 97], [98, 99]))).resolves.toBe("abc");
  });

  test("yields null when the peer closes before the header is complete", async () => {
    await expect(decodeFrame(chunks([0, 0, 1]))).resolves.toBeNull();
    await expect(decodeFrame(chunks())).resolves.toBeNull();
  });

  test("returns the received bytes when the peer closes early", async () => {
    await expect(decodeFrame(chunks([0, 0, 0, 10], "hello"))).resolves.toBe("hello");
  });

  test("replaces a cut-off multi-byte sequence", async () => {
    // "é" is C3 A9; only the lead byte arrives
    await expect(decodeFrame(chunks([0, 0, 0, 10, 0x61, 0xc3]))).resolves.toBe("a\uFFFD");
  });

  test("header with nothing after it decodes to an empty string", async () => {
    await expect(decodeFrame(chunks([0, 0, 0, 4]))).resolves.toBe("");
  });

  test("ignores bytes past the declared length", async () => {
    await expect(decodeFrame(chunks([0, 0, 0, 2], "abcd"))).resolves.toBe("ab");
  });

  test("stops reading once the payload is complete", async () => {
    let pulled = 0;
    async function* source() {
      pulled++;
      yield Uint8Array.from([0, 0, 0, 1, 120]);
      pulled++;
      yield Uint8Array.from([121]);
    }
    await expect(decodeFrame(source())).resolves.toBe("x");
    expect(pulled).toBe(1);
  });
});
