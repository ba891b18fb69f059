export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.length;
  }
  return out;
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

export function encodeUtf8(str: string): Uint8Array {
  return textEncoder.encode(str);
}

/** @throws TypeError if `bytes` is not well-formed UTF-8 */
export function decodeUtf8(bytes: Uint8Array): string {
  return textDecoder.decode(bytes);
}

/** IEEE-754 double, big-endian. */
export function encodeFloat64(value: number): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setFloat64(0, value, false);
  return out;
}

export function decodeFloat64(bytes: Uint8Array): number {
  if (bytes.length !== 8) throw new Error(`float body must be 8 bytes, got ${bytes.length}`);
  return new DataView(bytes.buffer, bytes.byteOffset, 8).getFloat64(0, false);
}

/** Big-endian magnitude of a non-negative bigint. Zero encodes as no bytes. */
export function encodeMagnitude(value: bigint): Uint8Array {
  if (value < 0n) throw new Error("magnitude must be non-negative");
  const out: number[] = [];
  let remaining = value;
  while (remaining !== 0n) {
    out.push(Number(remaining & 0xffn));
    remaining >>= 8n;
  }
  return Uint8Array.from(out.reverse());
}

export function decodeMagnitude(bytes: Uint8Array): bigint {
  let result = 0n;
  for (const b of bytes) {
    result = (result << 8n) | BigInt(b);
  }
  return result;
}
