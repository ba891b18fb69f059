// Token byte codec.
//
// Encoding is a pure function of the token. Decoding is incremental: bytes
// arrive in arbitrary chunks, and the reader asks a gate about every token
// as soon as its header and type byte are known, before any body byte is
// buffered. A refused body is consumed and thrown away, which keeps the
// byte cursor in step with the sender.

import {
  concat,
  decodeFloat64,
  decodeMagnitude,
  decodeUtf8,
  encodeFloat64,
  encodeMagnitude,
  encodeUtf8,
} from "./binary/bytes.ts";
import { HEADER_LIMIT, decodeHeader, encodeHeader } from "./binary/header.ts";
import { ProtocolError } from "./errors.ts";
import { TokenType, bodyLength, isTokenType } from "./token_type.ts";
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
  tokenTypeOf,
  vocabToken,
} from "./types.ts";

// ============================================================================
// Encoding
// ============================================================================

export function encodeToken(token: Token): Uint8Array {
  const type = Uint8Array.of(tokenTypeOf(token));
  switch (token.tag) {
    case "int":
      return concat(encodeHeader(Math.abs(token.value)), type);
    case "longint": {
      const body = encodeMagnitude(token.value < 0n ? -token.value : token.value);
      return concat(encodeHeader(body.length), type, body);
    }
    case "float":
      return concat(type, encodeFloat64(token.value));
    case "string":
      return concat(encodeHeader(token.value.length), type, token.value);
    case "vocab":
      return concat(encodeHeader(token.index), type);
    case "open":
    case "close":
    case "abort":
      return concat(encodeHeader(token.id), type);
    case "error": {
      const body = encodeUtf8(token.message);
      return concat(encodeHeader(body.length), type, body);
    }
  }
}

export function encodeTokens(tokens: Iterable<Token>): Uint8Array {
  const parts: Uint8Array[] = [];
  for (const token of tokens) {
    parts.push(encodeToken(token));
  }
  return concat(...parts);
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Consulted once per token, after its header and type byte are read and
 * before its body is buffered.
 */
export interface TokenGate {
  /**
   * @param type - the token's type byte
   * @param header - the header value: the body length for long tokens, the
   *   value for INT/NEG/VOCAB, the StructureId for OPEN/CLOSE/ABORT
   * @returns true to receive the token, false to skip it (its body is
   *   consumed without being buffered)
   * @throws ProtocolError to stop reading altogether
   */
  checkToken(type: TokenType, header: number): boolean;
}

export interface TokenHandler extends TokenGate {
  receiveToken(token: Token): void;
}

interface BodyState {
  type: TokenType;
  header: number;
  remaining: number;
  /** Null while skipping. */
  buffer: Uint8Array | null;
  filled: number;
}

const EMPTY = new Uint8Array(0);

/**
 * Incremental token reader.
 *
 * Once a ProtocolError has been raised (by the reader or by the handler),
 * the reader is dead and ignores any further input.
 */
export class TokenReader {
  private digits: number[] = [];
  private body: BodyState | null = null;
  private _failed: ProtocolError | null = null;

  constructor(private readonly handler: TokenHandler) {}

  get failed(): ProtocolError | null {
    return this._failed;
  }

  /**
   * Feed received bytes.
   *
   * @throws ProtocolError if the stream is malformed or the handler
   *   declared it so
   */
  feed(chunk: Uint8Array): void {
    if (this._failed) return;
    try {
      this.consume(chunk);
    } catch (e) {
      this._failed = e instanceof ProtocolError ? e : ProtocolError.internal(e);
      throw this._failed;
    }
  }

  /** Stop reading, e.g. because the session was torn down elsewhere. */
  halt(reason: ProtocolError): void {
    if (!this._failed) this._failed = reason;
  }

  private consume(chunk: Uint8Array): void {
    let i = 0;
    while (i < chunk.length) {
      if (this._failed) return;

      if (this.body) {
        const body = this.body;
        const take = Math.min(body.remaining, chunk.length - i);
        body.buffer?.set(chunk.subarray(i, i + take), body.filled);
        body.filled += take;
        body.remaining -= take;
        i += take;
        if (body.remaining === 0) {
          this.body = null;
          if (body.buffer) this.deliver(body.type, body.header, body.buffer);
        }
        continue;
      }

      const byte = chunk[i++];
      if (byte < 0x80) {
        if (this.digits.length >= HEADER_LIMIT) {
          throw ProtocolError.headerTooLong(HEADER_LIMIT);
        }
        this.digits.push(byte);
        continue;
      }

      const header = decodeHeader(this.digits);
      this.digits = [];
      this.startToken(byte, header);
    }
  }

  private startToken(byte: number, rawHeader: bigint): void {
    if (!isTokenType(byte)) {
      throw ProtocolError.unknownTokenType(byte);
    }
    if (byte === TokenType.LIST) {
      throw ProtocolError.obsoleteToken(byte);
    }
    if (rawHeader > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw ProtocolError.headerOutOfRange(byte, rawHeader);
    }
    const header = Number(rawHeader);
    if (byte === TokenType.NEG && header === 0) {
      // Zero is written as INT; a NEG of zero has no meaning
      throw ProtocolError.headerOutOfRange(byte, rawHeader);
    }
    const size = bodyLength(byte, header);
    const wanted = this.handler.checkToken(byte, header);

    if (size === 0) {
      if (wanted) this.deliver(byte, header, EMPTY);
      return;
    }
    this.body = {
      type: byte,
      header,
      remaining: size,
      buffer: wanted ? new Uint8Array(size) : null,
      filled: 0,
    };
  }

  private deliver(type: TokenType, header: number, body: Uint8Array): void {
    this.handler.receiveToken(decodeToken(type, header, body));
  }
}

function decodeToken(type: TokenType, header: number, body: Uint8Array): Token {
  switch (type) {
    case TokenType.INT:
      return intToken(header);
    case TokenType.NEG:
      return intToken(-header);
    case TokenType.FLOAT:
      return floatToken(decodeFloat64(body));
    case TokenType.STRING:
      return stringToken(body);
    case TokenType.LONGINT:
      return longIntToken(decodeMagnitude(body));
    case TokenType.LONGNEG:
      return longIntToken(-decodeMagnitude(body));
    case TokenType.VOCAB:
      return vocabToken(header);
    case TokenType.OPEN:
      return openToken(header);
    case TokenType.CLOSE:
      return closeToken(header);
    case TokenType.ABORT:
      return abortToken(header);
    case TokenType.ERROR:
      return errorToken(decodeDiagnostic(body));
    case TokenType.LIST:
      throw ProtocolError.obsoleteToken(type);
  }
}

function decodeDiagnostic(body: Uint8Array): string {
  try {
    return decodeUtf8(body);
  } catch (e) {
    if (!(e instanceof TypeError)) throw e;
    throw ProtocolError.remote("(diagnostic is not valid UTF-8)");
  }
}
