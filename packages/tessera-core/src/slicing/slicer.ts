// Slicer contract.
//
// A slicer turns one object into tokens. Its `slice` generator yields, in
// order:
//   - child objects, which the send stack hands to a new slicer
//   - EmitToken, a token to write as-is (primitives do this)
//   - Suspend, a promise to wait for before asking for more
//
// When `sendOpen` is true the send stack brackets the output with
// OPEN(id)/CLOSE(id) and numbers the structure; the first thing the
// generator yields is then its open type, as one or more strings.

import type { Token, Violation, Vocabulary } from "@tessera/wire";

/** Write `token` as-is. */
export class EmitToken {
  constructor(readonly token: Token) {}
}

/**
 * Wait for `promise` before continuing. The settled value is handed back
 * as the result of the `yield`. Only allowed while streaming is permitted
 * along the whole chain from the root; a rejection drops the session.
 */
export class Suspend {
  constructor(readonly promise: Promise<unknown>) {}
}

/** What a slicer can see of the stack that drives it. */
export interface SliceContext {
  readonly vocabulary: Vocabulary;
}

export interface Slicer {
  /** The object being sliced. */
  readonly obj: unknown;
  /** Bracket the output with OPEN/CLOSE. */
  readonly sendOpen: boolean;
  /** Number the object so later sightings go out as references. */
  readonly trackReferences: boolean;
  /**
   * Whether this slicer and its children may yield Suspend. Read each time
   * it suspends or starts a child, so `slice` may change it midway.
   */
  readonly streamable: boolean;

  parent: Slicer | null;

  /**
   * @param streamable - whether the chain above permits suspension
   */
  slice(streamable: boolean, context: SliceContext): Iterator<unknown, void, unknown>;

  /** Record `obj` as structure `id`. Delegates to the root by default. */
  registerReference(id: number, obj: unknown): void;

  /** Choose the slicer for a child. Delegates to the root by default. */
  slicerForObject(obj: unknown): Slicer;

  /**
   * A child was aborted. Throw to abort this slicer too; return to carry on
   * with the next child.
   */
  childAborted(violation: Violation): void;

  /** Location segment for diagnostics: the child currently being sliced. */
  describe(): string;
}

export abstract class BaseSlicer<T = unknown> implements Slicer {
  sendOpen = true;
  trackReferences = false;
  streamable = false;
  parent: Slicer | null = null;

  constructor(readonly obj: T) {}

  abstract slice(streamable: boolean, context: SliceContext): Iterator<unknown, void, unknown>;

  registerReference(id: number, obj: unknown): void {
    this.requireParent().registerReference(id, obj);
  }

  slicerForObject(obj: unknown): Slicer {
    return this.requireParent().slicerForObject(obj);
  }

  childAborted(violation: Violation): void {
    throw violation;
  }

  describe(): string {
    return "?";
  }

  private requireParent(): Slicer {
    if (!this.parent) {
      throw new Error(`${this.constructor.name} is not attached to a send stack`);
    }
    return this.parent;
  }
}
