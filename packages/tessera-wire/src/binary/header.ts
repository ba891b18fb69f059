// Token headers: base-128 digits, least significant first.
//
// Every digit byte has its high bit clear, so the first byte with the high
// bit set is the type byte that ends the header.

/** Maximum number of header digits accepted before the type byte. */
export const HEADER_LIMIT = 64;

export function encodeHeader(value: number | bigint): Uint8Array {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new Error(`header must be a safe integer, got ${value}`);
  }
  let remaining = typeof value === "bigint" ? value : BigInt(value);
  if (remaining < 0n) throw new Error("negative header");
  const out: number[] = [];
  while (remaining !== 0n) {
    out.push(Number(remaining & 0x7fn));
    remaining >>= 7n;
  }
  return Uint8Array.from(out);
}

export function decodeHeader(digits: readonly number[]): bigint {
  let result = 0n;
  for (let i = digits.length - 1; i >= 0; i--) {
    result = (result << 7n) | BigInt(digits[i]);
  }
  return result;
}
