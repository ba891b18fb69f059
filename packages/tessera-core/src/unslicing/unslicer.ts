// Unslicer contract.
//
// One unslicer builds one structure. The receive stack pushes it when the
// structure's open type is complete and pops it at the matching CLOSE.
// Between those it is asked about every token before the token's body is
// read (`checkToken`), and handed every decoded child (`receiveChild`):
// primitive values, finished child objects, Pending placeholders for
// objects that are not complete yet, or a Failure for a child that could
// not be built.
//
// Any method may throw a Violation. The stack then abandons this unslicer:
// its remaining tokens are discarded and its parent receives a Failure.

import {
  Failure,
  ProtocolError,
  type TokenType,
  Violation,
} from "@tessera/wire";
import type { Constraint, OpenType } from "@tessera/schema";
import { Pending } from "../references.ts";

/** Stack services an unslicer may use. */
export interface UnsliceContext {
  /** Record the object for structure `id` (a Pending if not complete). */
  setObject(id: number, obj: unknown): void;
  /**
   * Look up a previously opened structure.
   *
   * @throws ProtocolError if `id` has not been opened yet
   * @throws Violation if nothing was kept for it
   */
  getObject(id: number): unknown;
  /** Mark an abandoned structure so references to it fail. */
  setFailure(id: number, failure: Failure): void;
}

/**
 * Owner of open-type policy: checks index tokens and constructs the
 * unslicer for a completed open type. The root of every receive stack.
 */
export interface Opener {
  openerCheckToken(type: TokenType, size: number, opentype: OpenType): void;
  /** @returns the new unslicer, or null if more index tokens are needed */
  open(opentype: OpenType): Unslicer | null;
}

export type UnslicerState = "awaitingChildren" | "closed" | "abandoned" | "dropped";

export interface Unslicer {
  readonly parent: Unslicer | null;
  readonly state: UnslicerState;
  /** Receive STRING bodies as bytes instead of text. */
  readonly rawStrings: boolean;

  attach(parent: Unslicer, opener: Opener, context: UnsliceContext): void;
  setConstraint(constraint: Constraint): void;

  /** Called once when pushed; `id` is the structure's number. */
  start(id: number): void;

  /** Inspect a value token or child OPEN before it is accepted. */
  checkToken(type: TokenType, size: number): void;
  /** Inspect an index token of a child's open type. */
  openerCheckToken(type: TokenType, size: number, opentype: OpenType): void;
  /**
   * Build the unslicer for a child whose open type so far is `opentype`.
   *
   * @returns null if more index tokens are needed
   */
  doOpen(opentype: OpenType): Unslicer | null;

  receiveChild(child: unknown): void;
  /** @returns the finished object, a Pending, or a Failure */
  receiveClose(): unknown;
  /**
   * Called when popped, completed or not. `failure` is given when the
   * structure was abandoned.
   */
  finish(failure?: Failure): void;
  /** Mark as dropped along with the connection. */
  drop(failure: Failure): void;

  /** Location segment: the child currently being received. */
  describe(): string;
  /** Full location from the root. */
  where(): string;
}

export abstract class BaseUnslicer implements Unslicer {
  parent: Unslicer | null = null;
  rawStrings = false;
  protected id = -1;
  protected constraint: Constraint | null = null;
  private _state: UnslicerState = "awaitingChildren";
  private _opener: Opener | null = null;
  private _context: UnsliceContext | null = null;

  get state(): UnslicerState {
    return this._state;
  }

  attach(parent: Unslicer, opener: Opener, context: UnsliceContext): void {
    this.parent = parent;
    this._opener = opener;
    this._context = context;
  }

  setConstraint(constraint: Constraint): void {
    this.constraint = constraint;
  }

  start(id: number): void {
    this.id = id;
  }

  /**
   * Constraint for the next child, or null when unconstrained.
   *
   * @throws Violation if no further child is acceptable
   */
  protected childConstraint(): Constraint | null {
    return null;
  }

  checkToken(type: TokenType, size: number): void {
    this.childConstraint()?.checkToken(type, size);
  }

  openerCheckToken(type: TokenType, size: number, opentype: OpenType): void {
    this.opener.openerCheckToken(type, size, opentype);
  }

  doOpen(opentype: OpenType): Unslicer | null {
    const slot = this.childConstraint();
    const child = this.opener.open(opentype);
    if (child === null) return null;
    if (slot) child.setConstraint(slot.checkOpentype(opentype));
    return child;
  }

  abstract receiveChild(child: unknown): void;
  abstract receiveClose(): unknown;

  finish(failure?: Failure): void {
    if (failure) {
      this._state = "abandoned";
      if (this.id >= 0) this.context.setFailure(this.id, failure);
    } else if (this._state === "awaitingChildren") {
      this._state = "closed";
    }
  }

  drop(failure: Failure): void {
    this.finish(failure);
    this._state = "dropped";
  }

  describe(): string {
    return "?";
  }

  where(): string {
    const parent = this.parent ? this.parent.where() : "";
    return parent ? `${parent}.${this.describe()}` : this.describe();
  }

  protected get opener(): Opener {
    if (!this._opener) {
      throw new ProtocolError(`${this.constructor.name} used before it was attached`);
    }
    return this._opener;
  }

  protected get context(): UnsliceContext {
    if (!this._context) {
      throw new ProtocolError(`${this.constructor.name} used before it was attached`);
    }
    return this._context;
  }

  /**
   * Fill a slot of this structure now, or once `value` resolves. If it
   * fails instead, later references to this structure get the Failure
   * rather than an object with a hole in it.
   */
  protected fillWhenReady(value: unknown, fill: (value: unknown) => void): void {
    whenReady(value, fill, (failure) => {
      if (this.id >= 0) this.context.setFailure(this.id, failure);
    });
  }

  /**
   * Settle what can be settled about a child: a Failure (or a failed
   * Pending) is re-raised so this structure is abandoned too, and a
   * resolved Pending is replaced by its value. An unsettled Pending is
   * returned as it is.
   */
  protected unwrap(child: unknown): unknown {
    if (child instanceof Failure) {
      throw Violation.propagate(child);
    }
    if (child instanceof Pending) {
      const result = child.result;
      if (result && !result.ok) throw Violation.propagate(result.failure);
      if (result) return result.value;
    }
    return child;
  }
}

/**
 * Run `fill` with the value now, or when its placeholder resolves. A
 * placeholder that fails leaves the slot unfilled and calls `failed`.
 */
export function whenReady(
  value: unknown,
  fill: (value: unknown) => void,
  failed?: (failure: Failure) => void,
): void {
  if (value instanceof Pending) {
    value.onSettled((outcome) => {
      if (outcome.ok) {
        fill(outcome.value);
      } else {
        failed?.(outcome.failure);
      }
    });
  } else {
    fill(value);
  }
}
