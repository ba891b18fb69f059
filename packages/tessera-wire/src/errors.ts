// Failure taxonomy.
//
// Violation: the incoming data broke a constraint or a taster refused an
// object. Only the subtree being built is lost; the session carries on.
//
// ProtocolError: the token stream itself is malformed, or the bookkeeping
// that keeps both sides in step went wrong. The session is torn down.
//
// Both carry a location path that is set once, by the innermost frame that
// sees the failure, and never overwritten on the way out.

import { tokenName } from "./token_type.ts";

/** Recoverable, subtree-scoped failure. */
export class Violation extends Error {
  /** Location in the object graph, from the root. Set once. */
  where: string | null = null;

  /**
   * Set when this Violation re-raises a child's failure. The stacks hand the
   * original Failure upward instead of wrapping it again.
   */
  readonly failure: Failure | null;

  constructor(message: string, options: { failure?: Failure } = {}) {
    super(message);
    this.name = "Violation";
    this.failure = options.failure ?? null;
  }

  setLocation(where: string): void {
    if (this.where === null) {
      this.where = where;
    }
  }

  toString(): string {
    return this.where !== null
      ? `Violation (at ${this.where}): ${this.message}`
      : `Violation: ${this.message}`;
  }

  /** Re-raise a child's failure without nesting it. */
  static propagate(failure: Failure): Violation {
    return new Violation(failure.violation.message, { failure });
  }

  static tokenRefused(constraint: string, type: number): Violation {
    return new Violation(`${constraint} does not accept ${tokenName(type)} tokens`);
  }

  static tooLong(what: string, size: number, limit: number): Violation {
    return new Violation(`${what} of ${size} bytes exceeds the limit of ${limit}`);
  }

  static tooMany(what: string, limit: number): Violation {
    return new Violation(`more than ${limit} ${what}`);
  }

  static openTypeRefused(constraint: string, opentype: readonly string[]): Violation {
    return new Violation(`${constraint} does not accept open type (${opentype.join(", ")})`);
  }

  static unknownOpenType(opentype: readonly string[]): Violation {
    return new Violation(`unknown open type (${opentype.join(", ")})`);
  }

  static unsliceable(what: string): Violation {
    return new Violation(`cannot serialize ${what}`);
  }

  static aborted(): Violation {
    return new Violation("structure aborted by sender");
  }
}

/** Fatal failure; the session must be dropped. */
export class ProtocolError extends Error {
  /** Location in the object graph where the problem was noticed. Set once. */
  where: string | null = null;

  /** True when the peer reported the error with an ERROR token. */
  readonly fromPeer: boolean;

  constructor(message: string, options: { cause?: unknown; fromPeer?: boolean } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ProtocolError";
    this.fromPeer = options.fromPeer ?? false;
  }

  setLocation(where: string): void {
    if (this.where === null) {
      this.where = where;
    }
  }

  toString(): string {
    return this.where !== null
      ? `ProtocolError (in ${this.where}): ${this.message}`
      : `ProtocolError: ${this.message}`;
  }

  static unknownTokenType(byte: number): ProtocolError {
    return new ProtocolError(`unknown token type ${tokenName(byte)}`);
  }

  static obsoleteToken(byte: number): ProtocolError {
    return new ProtocolError(`obsolete token type ${tokenName(byte)}`);
  }

  static headerTooLong(limit: number): ProtocolError {
    return new ProtocolError(`token header longer than ${limit} bytes`);
  }

  static headerOutOfRange(type: number, header: bigint): ProtocolError {
    return new ProtocolError(`${tokenName(type)} header ${header} is out of range`);
  }

  static outOfOrderOpen(expected: number, got: number): ProtocolError {
    return new ProtocolError(`OPEN(${got}) out of sequence, expected OPEN(${expected})`);
  }

  static unmatchedClose(type: number, id: number, innermost: number | null): ProtocolError {
    const open = innermost === null ? "no structure is open" : `innermost open is ${innermost}`;
    return new ProtocolError(`${tokenName(type)}(${id}) does not match an OPEN: ${open}`);
  }

  static tooDeep(limit: number): ProtocolError {
    return new ProtocolError(`discarded structure nested more than ${limit} levels deep`);
  }

  static unknownVocabIndex(index: number): ProtocolError {
    return new ProtocolError(`VOCAB index ${index} is not in the vocabulary table`);
  }

  static danglingReference(id: number, opened: number): ProtocolError {
    return new ProtocolError(`reference to structure ${id}, but only ${opened} have been opened`);
  }

  static remote(message: string): ProtocolError {
    return new ProtocolError(`remote error: ${message}`, { fromPeer: true });
  }

  static connectionLost(reason: string): ProtocolError {
    return new ProtocolError(`connection lost: ${reason}`);
  }

  /** An exception that is neither Violation nor ProtocolError escaped a frame. */
  static internal(cause: unknown): ProtocolError {
    const message = cause instanceof Error ? cause.message : String(cause);
    return new ProtocolError(`internal error: ${message}`, { cause });
  }
}

/**
 * A Violation packaged for delivery to a parent frame in place of the child
 * object it was expecting.
 */
export class Failure {
  constructor(readonly violation: Violation) {}

  get where(): string | null {
    return this.violation.where;
  }

  get message(): string {
    return this.violation.message;
  }

  toString(): string {
    return `[Failure in ${this.where ?? "<unknown>"}: ${this.message}]`;
  }
}

export function isFailure(value: unknown): value is Failure {
  return value instanceof Failure;
}
