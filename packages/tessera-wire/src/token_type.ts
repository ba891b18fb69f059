// Token type bytes.
//
// Type bytes always have the high bit set; header digits never do.

export const TokenType = {
  /** Obsolete list delimiter. Never sent; receiving it is a protocol error. */
  LIST: 0x80,
  /** Non-negative integer carried in the header. */
  INT: 0x81,
  /** Byte string; header is the body length. */
  STRING: 0x82,
  /** Negative integer; header is the magnitude. */
  NEG: 0x83,
  /** 8-byte big-endian IEEE-754 double. */
  FLOAT: 0x84,
  /** Arbitrary-precision non-negative integer; header is the body length. */
  LONGINT: 0x85,
  /** Arbitrary-precision negative integer; header is the body length. */
  LONGNEG: 0x86,
  /** Index into the pre-agreed vocabulary table. */
  VOCAB: 0x87,
  /** Structure open; header is the StructureId. */
  OPEN: 0x88,
  /** Structure close; header is the StructureId being closed. */
  CLOSE: 0x89,
  /** Structure abandoned by the sender; a CLOSE always follows. */
  ABORT: 0x8a,
  /** Fatal diagnostic; header is the body length. */
  ERROR: 0x8d,
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

/** Default limit on the body length of long tokens. */
export const SIZE_LIMIT = 1000;

/** Body length of a FLOAT token. */
export const FLOAT_SIZE = 8;

const TOKEN_NAMES: ReadonlyMap<number, string> = new Map(
  Object.entries(TokenType).map(([name, byte]) => [byte, name]),
);

const TOKEN_TYPES: ReadonlySet<number> = new Set(Object.values(TokenType));

export function isTokenType(byte: number): byte is TokenType {
  return TOKEN_TYPES.has(byte);
}

/** Human-readable name of a type byte, for diagnostics. */
export function tokenName(type: number): string {
  return TOKEN_NAMES.get(type) ?? `0x${type.toString(16).padStart(2, "0")}`;
}

/** Long tokens carry a variable-length body whose size is the header. */
export function isLongTokenType(type: TokenType): boolean {
  return (
    type === TokenType.STRING ||
    type === TokenType.LONGINT ||
    type === TokenType.LONGNEG ||
    type === TokenType.ERROR
  );
}

export function isStructuralTokenType(type: TokenType): boolean {
  return type === TokenType.OPEN || type === TokenType.CLOSE || type === TokenType.ABORT;
}

/** Number of body bytes that follow the type byte. */
export function bodyLength(type: TokenType, header: number): number {
  if (isLongTokenType(type)) return header;
  if (type === TokenType.FLOAT) return FLOAT_SIZE;
  return 0;
}
