// Tessera wire format
//
// Token vocabulary, token values, the byte codec and the failure taxonomy
// shared by the encode and decode stacks.

// ============================================================================
// Token vocabulary
// ============================================================================

export {
  TokenType,
  SIZE_LIMIT,
  FLOAT_SIZE,
  isTokenType,
  isLongTokenType,
  isStructuralTokenType,
  tokenName,
  bodyLength,
} from "./token_type.ts";

export { Vocabulary, BUILTIN_OPEN_TYPES } from "./vocabulary.ts";

// ============================================================================
// Tokens
// ============================================================================

export type {
  Token,
  IntToken,
  LongIntToken,
  FloatToken,
  StringToken,
  VocabToken,
  OpenToken,
  CloseToken,
  AbortToken,
  ErrorToken,
} from "./types.ts";

export {
  intToken,
  longIntToken,
  floatToken,
  stringToken,
  vocabToken,
  openToken,
  closeToken,
  abortToken,
  errorToken,
  tokenTypeOf,
} from "./types.ts";

// ============================================================================
// Codec
// ============================================================================

export {
  encodeToken,
  encodeTokens,
  TokenReader,
  type TokenGate,
  type TokenHandler,
} from "./codec.ts";

export { HEADER_LIMIT, encodeHeader, decodeHeader } from "./binary/header.ts";
export { concat, encodeUtf8, decodeUtf8 } from "./binary/bytes.ts";

// ============================================================================
// Errors
// ============================================================================

export { Violation, ProtocolError, Failure, isFailure } from "./errors.ts";
