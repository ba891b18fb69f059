// Receive stack: turns tokens back into objects.
//
// The stack is the TokenReader's handler. For every token it first answers
// the gate (accept, or skip the body unread), then routes the decoded
// token to the unslicer on top.
//
// Two pieces of bookkeeping keep it in step with the sender whatever
// happens to the objects being built:
//   - every OPEN id is pushed on `openIds` and must be popped by a CLOSE
//     or ABORT with the same id; anything else is a ProtocolError
//   - once an unslicer is abandoned, `discardDepth` counts the CLOSE
//     tokens still owed by structures nobody is building; while it is
//     non-zero value tokens are skipped and OPENs only add to it
//
// A Violation costs one subtree: the unslicer it came from is popped, its
// parent receives a Failure, and the session goes on. A ProtocolError
// propagates out to the reader and ends the session.

import {
  Failure,
  ProtocolError,
  type Token,
  type TokenHandler,
  TokenType,
  Violation,
  type Vocabulary,
  decodeUtf8,
  isLongTokenType,
  isStructuralTokenType,
  tokenName,
} from "@tessera/wire";
import type { Constraint } from "@tessera/schema";
import { type Logger, createLogger, describeError } from "../logging.ts";
import { Pending, ReceiveReferenceTable } from "../references.ts";
import type { UnslicerRegistry } from "./registry.ts";
import { RootUnslicer } from "./root.ts";
import type { UnsliceContext, Unslicer } from "./unslicer.ts";

export type Received = { ok: true; value: unknown } | { ok: false; failure: Failure };

export interface ReceiveStackOptions {
  registry: UnslicerRegistry;
  vocabulary: Vocabulary;
  /** Constraint for each top-level object; null for none. */
  constraint: Constraint | null;
  /** Deepest nesting of structures accepted. */
  maxDepth: number;
  /** Largest long-token body accepted anywhere, whatever the constraints say. */
  maxTokenSize: number;
  /** Forget received objects after each top-level object. */
  referenceScope: "connection" | "message";
  /** Receives each top-level object, or its Failure, in arrival order. */
  deliver: (result: Received) => void;
  logger?: Logger;
}

/** The OPEN whose index tokens are still arriving. */
interface Opening {
  id: number;
  opentype: string[];
}

export class ReceiveStack implements TokenHandler, UnsliceContext {
  readonly references = new ReceiveReferenceTable();
  private readonly root: RootUnslicer;
  private readonly stack: Unslicer[];
  private readonly openIds: number[] = [];
  private openCount = 0;
  private opening: Opening | null = null;
  private discardDepth = 0;
  private dead: ProtocolError | null = null;
  private readonly log: Logger;

  constructor(private readonly options: ReceiveStackOptions) {
    this.root = new RootUnslicer(
      options.registry,
      (child) => this.deliverTopLevel(child),
      options.constraint,
    );
    this.stack = [this.root];
    this.log = options.logger ?? createLogger("tessera:recv");
  }

  /** Number of structures opened so far. */
  get opened(): number {
    return this.openCount;
  }

  /** Unslicers currently being built, not counting the root. */
  get depth(): number {
    return this.stack.length - 1;
  }

  /** CLOSE tokens still to be swallowed for abandoned structures. */
  get discarding(): number {
    return this.discardDepth;
  }

  get failed(): ProtocolError | null {
    return this.dead;
  }

  private get top(): Unslicer {
    return this.stack[this.stack.length - 1];
  }

  // ==========================================================================
  // TokenHandler
  // ==========================================================================

  checkToken(type: TokenType, header: number): boolean {
    if (this.dead) return false;
    if (isStructuralTokenType(type)) return true;
    if (type === TokenType.ERROR) {
      if (header > this.options.maxTokenSize) {
        throw ProtocolError.remote(`(${header} byte diagnostic not read)`);
      }
      return true;
    }
    if (this.discardDepth > 0) return false;

    try {
      if (this.opening) {
        this.top.openerCheckToken(type, header, this.opening.opentype);
      } else {
        this.top.checkToken(type, header);
      }
      if (isLongTokenType(type) && header > this.options.maxTokenSize) {
        throw Violation.tooLong(tokenName(type), header, this.options.maxTokenSize);
      }
      return true;
    } catch (e) {
      this.violated(e, this.opening ? 1 : 0);
      return false;
    }
  }

  receiveToken(token: Token): void {
    try {
      switch (token.tag) {
        case "open":
          this.handleOpen(token.id);
          return;
        case "close":
          this.handleClose(token.id);
          return;
        case "abort":
          this.handleAbort(token.id);
          return;
        case "error":
          throw ProtocolError.remote(token.message);
        default:
          this.handleValue(token);
      }
    } catch (e) {
      const error = e instanceof ProtocolError ? e : ProtocolError.internal(e);
      error.setLocation(this.top.where());
      throw error;
    }
  }

  // ==========================================================================
  // Token handlers
  // ==========================================================================

  private handleOpen(id: number): void {
    if (id !== this.openCount) {
      throw ProtocolError.outOfOrderOpen(this.openCount, id);
    }
    this.openCount++;
    this.openIds.push(id);
    if (this.discardDepth > 0) {
      // Nothing is built here, so there is no unslicer to take a Violation
      if (this.openIds.length > this.options.maxDepth) {
        throw ProtocolError.tooDeep(this.options.maxDepth);
      }
      this.discardDepth++;
      return;
    }

    // The new structure's own CLOSE is owed, on top of whatever the
    // structure being opened owes
    const owed = this.opening ? 2 : 1;
    try {
      if (this.opening) {
        this.top.openerCheckToken(TokenType.OPEN, 0, this.opening.opentype);
      } else {
        this.top.checkToken(TokenType.OPEN, 0);
      }
      if (this.depth >= this.options.maxDepth) {
        throw Violation.tooMany("levels of nesting", this.options.maxDepth);
      }
    } catch (e) {
      this.violated(e, owed);
      return;
    }
    this.opening = { id, opentype: [] };
  }

  private handleValue(token: Token): void {
    if (this.discardDepth > 0) return;
    const opening = this.opening;

    if (opening) {
      let child: Unslicer | null;
      try {
        opening.opentype.push(this.decodeIndexToken(token));
        child = this.top.doOpen(opening.opentype);
      } catch (e) {
        this.violated(e, 1);
        return;
      }
      if (child === null) return;
      this.opening = null;
      this.push(child, opening.id);
      return;
    }

    try {
      this.top.receiveChild(this.decodeValue(token, this.top.rawStrings));
    } catch (e) {
      this.violated(e, 0);
    }
  }

  private handleClose(id: number): void {
    this.popOpenId(TokenType.CLOSE, id);
    if (this.discardDepth > 0) {
      this.discardDepth--;
      return;
    }

    if (this.opening) {
      // Closed before its open type was complete: nothing was built
      this.opening = null;
      const violation = new Violation("structure closed before its open type was complete");
      this.giveChild(new Failure(this.located(violation)));
      return;
    }

    const unslicer = this.top;
    let result: unknown;
    let failure: Failure | undefined;
    try {
      result = unslicer.receiveClose();
    } catch (e) {
      failure = this.failureOf(e, unslicer);
      result = failure;
    }
    this.stack.pop();
    unslicer.finish(failure);
    this.giveChild(result);
  }

  private handleAbort(id: number): void {
    const innermost = this.openIds.at(-1);
    if (innermost !== id) {
      throw ProtocolError.unmatchedClose(TokenType.ABORT, id, innermost ?? null);
    }
    if (this.discardDepth > 0) return;

    this.log.log("aborted", { id });
    if (this.opening) {
      // The structure never got an unslicer; only its CLOSE is owed
      this.opening = null;
      this.discardDepth++;
      this.giveChild(new Failure(this.located(Violation.aborted())));
      return;
    }
    this.violated(Violation.aborted(), 0);
  }

  // ==========================================================================
  // Stack maintenance
  // ==========================================================================

  private push(child: Unslicer, id: number): void {
    child.attach(this.top, this.root, this);
    this.stack.push(child);
    try {
      child.start(id);
    } catch (e) {
      this.violated(e, 0);
    }
  }

  /** Hand a finished child, a Pending or a Failure to the unslicer on top. */
  private giveChild(child: unknown): void {
    try {
      this.top.receiveChild(child);
    } catch (e) {
      this.violated(e, 0);
    }
  }

  /**
   * The unslicer on top raised. A Violation abandons it; anything else is
   * rethrown as a ProtocolError.
   *
   * @param owed - CLOSE tokens owed by structures opened above the top
   *   that have no unslicer of their own
   */
  private violated(error: unknown, owed: number): void {
    if (!(error instanceof Violation)) {
      throw error instanceof ProtocolError ? error : ProtocolError.internal(error);
    }
    const unslicer = this.top;
    const failure = this.failureOf(error, unslicer);
    this.opening = null;

    if (unslicer === this.root) {
      this.discardDepth += owed;
      this.root.receiveChild(failure);
      return;
    }

    this.log.log("abandon", { error: describeError(failure.violation) });
    this.stack.pop();
    unslicer.finish(failure);
    this.discardDepth += owed + 1;
    this.giveChild(failure);
  }

  private failureOf(error: unknown, unslicer: Unslicer): Failure {
    if (!(error instanceof Violation)) {
      throw error instanceof ProtocolError ? error : ProtocolError.internal(error);
    }
    error.setLocation(unslicer.where());
    return error.failure ?? new Failure(error);
  }

  private located(violation: Violation): Violation {
    violation.setLocation(this.top.where());
    return violation;
  }

  private popOpenId(type: TokenType, id: number): void {
    const innermost = this.openIds.at(-1);
    if (innermost !== id) {
      throw ProtocolError.unmatchedClose(type, id, innermost ?? null);
    }
    this.openIds.pop();
  }

  private deliverTopLevel(child: unknown): void {
    this.log.log("deliver", {
      ok: !(child instanceof Failure),
      pending: child instanceof Pending,
    });
    if (child instanceof Pending) {
      child.onSettled((outcome) => {
        this.options.deliver(
          outcome.ok ? { ok: true, value: outcome.value } : { ok: false, failure: outcome.failure },
        );
      });
    } else if (child instanceof Failure) {
      this.options.deliver({ ok: false, failure: child });
    } else {
      this.options.deliver({ ok: true, value: child });
    }

    // Nothing still to come can resolve a placeholder left over now
    this.references.failUnresolved(
      () => new Violation("reference cycle through immutable containers cannot be resolved"),
    );
    if (this.options.referenceScope === "message") {
      this.references.clear();
    }
  }

  // ==========================================================================
  // Values
  // ==========================================================================

  private decodeValue(token: Token, rawStrings: boolean): unknown {
    switch (token.tag) {
      case "int":
      case "longint":
      case "float":
        return token.value;
      case "string":
        return rawStrings ? token.value : decodeString(token.value);
      case "vocab":
        return this.lookupVocab(token.index);
      default:
        throw new ProtocolError(`unexpected ${token.tag} token`);
    }
  }

  private decodeIndexToken(token: Token): string {
    if (token.tag === "string") return decodeString(token.value);
    if (token.tag === "vocab") return this.lookupVocab(token.index);
    throw new ProtocolError(`unexpected ${token.tag} token in an open type`);
  }

  private lookupVocab(index: number): string {
    const word = this.options.vocabulary.wordAt(index);
    if (word === undefined) {
      throw ProtocolError.unknownVocabIndex(index);
    }
    return word;
  }

  // ==========================================================================
  // UnsliceContext
  // ==========================================================================

  setObject(id: number, obj: unknown): void {
    this.references.setObject(id, obj);
  }

  getObject(id: number): unknown {
    return this.references.getObject(id, this.openCount);
  }

  setFailure(id: number, failure: Failure): void {
    this.references.setFailure(id, failure);
  }

  // ==========================================================================
  // Teardown
  // ==========================================================================

  /**
   * Abandon everything under construction. Every unslicer is finished with
   * a Failure, so every placeholder settles.
   */
  connectionLost(reason: ProtocolError): void {
    if (this.dead) return;
    this.dead = reason;
    const failure = new Failure(new Violation(`connection dropped: ${reason.message}`));
    while (this.stack.length > 1) {
      const unslicer = this.stack.pop();
      unslicer?.drop(failure);
    }
    this.references.failUnresolved(() => failure.violation);
    this.opening = null;
  }
}

function decodeString(bytes: Uint8Array): string {
  try {
    return decodeUtf8(bytes);
  } catch (e) {
    if (!(e instanceof TypeError)) throw e;
    throw new Violation("STRING is not valid UTF-8");
  }
}
