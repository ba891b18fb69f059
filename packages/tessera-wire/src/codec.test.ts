// Tests for the token byte codec

import { describe, it, expect } from "vitest";
import { encodeToken, encodeTokens, TokenReader, type TokenHandler } from "./codec.ts";
import { ProtocolError } from "./errors.ts";
import { TokenType } from "./token_type.ts";
import {
  type Token,
  abortToken,
  closeToken,
  errorToken,
  floatToken,
  intToken,
  longIntToken,
  openToken,
  stringToken,
  vocabToken,
} from "./types.ts";

class RecordingHandler implements TokenHandler {
  checks: Array<[number, number]> = [];
  tokens: Token[] = [];
  refuse = new Set<number>();

  checkToken(type: TokenType, header: number): boolean {
    this.checks.push([type, header]);
    return !this.refuse.has(type);
  }

  receiveToken(token: Token): void {
    this.tokens.push(token);
  }
}

// ============================================================================
// Encoding
// ============================================================================

describe("encodeToken", () => {
  it("writes INT with the value as header", () => {
    expect(Array.from(encodeToken(intToken(0)))).toEqual([0x81]);
    expect(Array.from(encodeToken(intToken(200)))).toEqual([0x48, 0x01, 0x81]);
  });

  it("writes negative integers as NEG with the magnitude", () => {
    expect(Array.from(encodeToken(intToken(-5)))).toEqual([0x05, 0x83]);
  });

  it("writes STRING with its length header and body", () => {
    expect(Array.from(encodeToken(stringToken("hi")))).toEqual([0x02, 0x82, 0x68, 0x69]);
  });

  it("writes FLOAT as 8 big-endian bytes", () => {
    expect(Array.from(encodeToken(floatToken(1.5)))).toEqual([
      0x84, 0x3f, 0xf8, 0, 0, 0, 0, 0, 0,
    ]);
  });

  it("writes LONGINT and LONGNEG with big-endian magnitudes", () => {
    expect(Array.from(encodeToken(longIntToken(2n ** 64n)))).toEqual([
      0x09, 0x85, 0x01, 0, 0, 0, 0, 0, 0, 0, 0,
    ]);
    expect(Array.from(encodeToken(longIntToken(-256n)))).toEqual([0x02, 0x86, 0x01, 0x00]);
  });

  it("writes structural tokens with the StructureId as header", () => {
    expect(Array.from(encodeToken(openToken(0)))).toEqual([0x88]);
    expect(Array.from(encodeToken(closeToken(1)))).toEqual([0x01, 0x89]);
    expect(Array.from(encodeToken(abortToken(130)))).toEqual([0x02, 0x01, 0x8a]);
  });

  it("writes VOCAB and ERROR", () => {
    expect(Array.from(encodeToken(vocabToken(3)))).toEqual([0x03, 0x87]);
    expect(Array.from(encodeToken(errorToken("bad")))).toEqual([0x03, 0x8d, 0x62, 0x61, 0x64]);
  });

  it("concatenates several tokens", () => {
    const bytes = encodeTokens([openToken(0), stringToken("x"), closeToken(0)]);
    expect(Array.from(bytes)).toEqual([0x88, 0x01, 0x82, 0x78, 0x89]);
  });
});

// ============================================================================
// Decoding
// ============================================================================

describe("TokenReader", () => {
  it("decodes a token sequence fed one byte at a time", () => {
    const handler = new RecordingHandler();
    const reader = new TokenReader(handler);
    const bytes = encodeTokens([
      openToken(0),
      stringToken("list"),
      intToken(-7),
      floatToken(0.25),
      longIntToken(-(2n ** 70n)),
      vocabToken(2),
      closeToken(0),
    ]);

    for (const b of bytes) {
      reader.feed(Uint8Array.of(b));
    }

    expect(handler.tokens).toEqual([
      openToken(0),
      stringToken("list"),
      intToken(-7),
      floatToken(0.25),
      longIntToken(-(2n ** 70n)),
      vocabToken(2),
      closeToken(0),
    ]);
  });

  it("consults the gate before any body byte arrives", () => {
    const handler = new RecordingHandler();
    const reader = new TokenReader(handler);

    // header 10000 = 0x10 0x4e, then STRING, no body yet
    reader.feed(Uint8Array.of(0x10, 0x4e, 0x82));

    expect(handler.checks).toEqual([[TokenType.STRING, 10000]]);
    expect(handler.tokens).toEqual([]);
  });

  it("skips refused bodies and stays in sync", () => {
    const handler = new RecordingHandler();
    handler.refuse.add(TokenType.STRING);
    const reader = new TokenReader(handler);

    reader.feed(encodeTokens([stringToken("discard me"), intToken(42)]));

    expect(handler.tokens).toEqual([intToken(42)]);
    expect(handler.checks).toEqual([
      [TokenType.STRING, 10],
      [TokenType.INT, 42],
    ]);
  });

  it("reads a body split across chunks", () => {
    const handler = new RecordingHandler();
    const reader = new TokenReader(handler);
    const bytes = encodeToken(stringToken("abcdef"));

    reader.feed(bytes.subarray(0, 4));
    expect(handler.tokens).toEqual([]);
    reader.feed(bytes.subarray(4));

    expect(handler.tokens).toEqual([stringToken("abcdef")]);
  });

  it("rejects unknown type bytes and ignores later input", () => {
    const handler = new RecordingHandler();
    const reader = new TokenReader(handler);

    expect(() => reader.feed(Uint8Array.of(0x8b))).toThrow(ProtocolError);
    expect(reader.failed?.message).toBe("unknown token type 0x8b");

    reader.feed(encodeToken(intToken(1)));
    expect(handler.tokens).toEqual([]);
  });

  it("rejects the obsolete LIST token", () => {
    const reader = new TokenReader(new RecordingHandler());
    expect(() => reader.feed(Uint8Array.of(0x80))).toThrow("obsolete token type LIST");
  });

  it("rejects headers longer than the limit", () => {
    const reader = new TokenReader(new RecordingHandler());
    expect(() => reader.feed(new Uint8Array(65).fill(0x01))).toThrow(
      "token header longer than 64 bytes",
    );
  });

  it("rejects INT headers beyond the safe integer range", () => {
    const reader = new TokenReader(new RecordingHandler());
    // 2^53: seven zero digits, then 2^4
    expect(() => reader.feed(Uint8Array.of(0, 0, 0, 0, 0, 0, 0, 0x10, 0x81))).toThrow(
      "INT header 9007199254740992 is out of range",
    );
  });

  it("rejects a NEG token with a zero header", () => {
    const handler = new RecordingHandler();
    const reader = new TokenReader(handler);
    expect(() => reader.feed(Uint8Array.of(0x83))).toThrow("NEG header 0 is out of range");
    expect(handler.checks).toEqual([]);
  });

  it("reports an ERROR body that is not UTF-8 without its text", () => {
    const reader = new TokenReader(new RecordingHandler());
    expect(() => reader.feed(Uint8Array.of(0x01, 0x8d, 0xff))).toThrow(
      "remote error: (diagnostic is not valid UTF-8)",
    );
    expect(reader.failed?.fromPeer).toBe(true);
  });

  it("stops after the handler raises a ProtocolError", () => {
    const reader = new TokenReader({
      checkToken: () => true,
      receiveToken: (token) => {
        if (token.tag === "close") throw new ProtocolError("unexpected CLOSE");
      },
    });

    expect(() => reader.feed(encodeToken(closeToken(0)))).toThrow("unexpected CLOSE");
    expect(reader.failed).toBeInstanceOf(ProtocolError);
    expect(() => reader.feed(encodeToken(closeToken(0)))).not.toThrow();
  });

  it("classifies other handler exceptions as internal protocol errors", () => {
    const reader = new TokenReader({
      checkToken: () => true,
      receiveToken: () => {
        throw new TypeError("boom");
      },
    });

    expect(() => reader.feed(encodeToken(intToken(1)))).toThrow("internal error: boom");
    expect(reader.failed?.cause).toBeInstanceOf(TypeError);
  });
});
