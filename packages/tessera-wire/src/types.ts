// Token values as they travel between the codec and the stacks.
//
// Signed integers are kept as one variant each; the codec picks INT/NEG and
// LONGINT/LONGNEG from the sign.

import { encodeUtf8 } from "./binary/bytes.ts";
import { TokenType } from "./token_type.ts";

/** Safe integer, sent as INT (>= 0) or NEG (< 0). */
export interface IntToken {
  tag: "int";
  value: number;
}

/** Arbitrary-precision integer, sent as LONGINT or LONGNEG. */
export interface LongIntToken {
  tag: "longint";
  value: bigint;
}

export interface FloatToken {
  tag: "float";
  value: number;
}

/** Raw byte string. Text is carried as UTF-8. */
export interface StringToken {
  tag: "string";
  value: Uint8Array;
}

export interface VocabToken {
  tag: "vocab";
  index: number;
}

export interface OpenToken {
  tag: "open";
  id: number;
}

export interface CloseToken {
  tag: "close";
  id: number;
}

export interface AbortToken {
  tag: "abort";
  id: number;
}

export interface ErrorToken {
  tag: "error";
  message: string;
}

export type Token =
  | IntToken
  | LongIntToken
  | FloatToken
  | StringToken
  | VocabToken
  | OpenToken
  | CloseToken
  | AbortToken
  | ErrorToken;

// ============================================================================
// Factory functions
// ============================================================================

export function intToken(value: number): IntToken {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`INT token needs a safe integer, got ${value}`);
  }
  return { tag: "int", value };
}

export function longIntToken(value: bigint): LongIntToken {
  return { tag: "longint", value };
}

export function floatToken(value: number): FloatToken {
  return { tag: "float", value };
}

export function stringToken(value: string | Uint8Array): StringToken {
  return { tag: "string", value: typeof value === "string" ? encodeUtf8(value) : value };
}

export function vocabToken(index: number): VocabToken {
  return { tag: "vocab", index };
}

export function openToken(id: number): OpenToken {
  return { tag: "open", id };
}

export function closeToken(id: number): CloseToken {
  return { tag: "close", id };
}

export function abortToken(id: number): AbortToken {
  return { tag: "abort", id };
}

export function errorToken(message: string): ErrorToken {
  return { tag: "error", message };
}

/** The type byte a token is written with. */
export function tokenTypeOf(token: Token): TokenType {
  switch (token.tag) {
    case "int":
      return token.value < 0 ? TokenType.NEG : TokenType.INT;
    case "longint":
      return token.value < 0n ? TokenType.LONGNEG : TokenType.LONGINT;
    case "float":
      return TokenType.FLOAT;
    case "string":
      return TokenType.STRING;
    case "vocab":
      return TokenType.VOCAB;
    case "open":
      return TokenType.OPEN;
    case "close":
      return TokenType.CLOSE;
    case "abort":
      return TokenType.ABORT;
    case "error":
      return TokenType.ERROR;
  }
}
