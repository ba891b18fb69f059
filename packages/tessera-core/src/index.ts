// Tessera core
//
// Reference tables, the send and receive stacks, and the session that
// joins them to a byte transport.

// ============================================================================
// Session
// ============================================================================

export { TokenSession, createSessionPair } from "./session.ts";
export { type ByteTransport, MemoryTransport } from "./transport.ts";
export {
  type SessionOptions,
  type ResolvedOptions,
  type ReferenceScope,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_TOKEN_SIZE,
  resolveOptions,
} from "./options.ts";

// ============================================================================
// Stacks
// ============================================================================

export * from "./slicing/index.ts";
export * from "./unslicing/index.ts";

export {
  type Settled,
  Pending,
  SendReferenceTable,
  ReceiveReferenceTable,
} from "./references.ts";

// ============================================================================
// Utilities
// ============================================================================

export { type Channel, createChannel, drain } from "./channel.ts";
export { type Logger, createLogger, isEnabled, matchPattern } from "./logging.ts";
