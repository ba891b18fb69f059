// Reference tables.
//
// Every structure is numbered by the order of its OPEN token on the wire,
// counting from 0 for the life of the table. The sender remembers which
// objects it has numbered so a second sighting goes out as a `reference`
// structure; the receiver maps numbers back to the objects it built.
//
// An immutable container cannot exist before its children do, so on the
// receive side it is represented by a Pending placeholder until it closes.

import { Failure, ProtocolError, Violation } from "@tessera/wire";

export type Settled<T> = { ok: true; value: T } | { ok: false; failure: Failure };

/**
 * Placeholder for a decoded object that is not complete yet.
 *
 * Settles exactly once. Continuations run synchronously, in the order they
 * were registered, at the moment it settles; one registered afterwards runs
 * immediately.
 */
export class Pending<T = unknown> {
  private outcome: Settled<T> | null = null;
  private waiters: Array<(outcome: Settled<T>) => void> = [];

  get settled(): boolean {
    return this.outcome !== null;
  }

  get result(): Settled<T> | null {
    return this.outcome;
  }

  onSettled(callback: (outcome: Settled<T>) => void): void {
    if (this.outcome) {
      callback(this.outcome);
    } else {
      this.waiters.push(callback);
    }
  }

  resolve(value: T): void {
    this.settle({ ok: true, value });
  }

  fail(failure: Failure): void {
    this.settle({ ok: false, failure });
  }

  private settle(outcome: Settled<T>): void {
    if (this.outcome) {
      throw new ProtocolError("placeholder settled twice");
    }
    this.outcome = outcome;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(outcome);
    }
  }
}

// ============================================================================
// Send side
// ============================================================================

export class SendReferenceTable {
  private readonly ids = new Map<object, number>();

  get size(): number {
    return this.ids.size;
  }

  get(obj: object): number | undefined {
    return this.ids.get(obj);
  }

  /**
   * @throws ProtocolError if the object is already numbered; the encoder
   *   should have sent a reference instead of opening it again
   */
  register(id: number, obj: object): void {
    const existing = this.ids.get(obj);
    if (existing !== undefined) {
      throw new ProtocolError(`object already sent as structure ${existing}, not ${id}`);
    }
    this.ids.set(obj, id);
  }

  clear(): void {
    this.ids.clear();
  }
}

// ============================================================================
// Receive side
// ============================================================================

export class ReceiveReferenceTable {
  private readonly objects = new Map<number, unknown>();
  private readonly unresolved = new Set<Pending>();

  get size(): number {
    return this.objects.size;
  }

  /** Placeholders registered and not settled yet. */
  get pendingCount(): number {
    return this.unresolved.size;
  }

  /**
   * Record the object built for structure `id`. A Pending is replaced by
   * its value, or by its Failure, when it settles.
   *
   * @throws ProtocolError if `id` already has an entry
   */
  setObject(id: number, obj: unknown): void {
    if (this.objects.has(id)) {
      throw new ProtocolError(`structure ${id} registered twice`);
    }
    this.objects.set(id, obj);
    if (obj instanceof Pending && !obj.settled) {
      const pending = obj;
      this.unresolved.add(pending);
      pending.onSettled((outcome) => {
        this.unresolved.delete(pending);
        if (this.objects.get(id) === pending) {
          this.objects.set(id, outcome.ok ? outcome.value : outcome.failure);
        }
      });
    }
  }

  /**
   * Replace the entry for an abandoned structure, so later references to it
   * fail instead of seeing a half-built object.
   */
  setFailure(id: number, failure: Failure): void {
    if (this.objects.has(id)) {
      this.objects.set(id, failure);
    }
  }

  /**
   * Look up the target of a `reference` structure: the object, a Pending,
   * or the Failure of a structure that was abandoned.
   *
   * @param opened - how many structures have been opened so far
   * @throws ProtocolError if `id` has not been opened yet
   * @throws Violation if `id` was opened but nothing was kept for it
   */
  getObject(id: number, opened: number): unknown {
    if (id >= opened) {
      throw ProtocolError.danglingReference(id, opened);
    }
    if (!this.objects.has(id)) {
      throw new Violation(`reference to structure ${id}, which was not kept`);
    }
    return this.objects.get(id);
  }

  /**
   * Fail every placeholder still unresolved. Called once a top-level object
   * is complete, when nothing left on the wire can resolve them.
   */
  failUnresolved(reason: () => Violation): void {
    for (const pending of [...this.unresolved]) {
      // Failing one may have failed others through their continuations
      if (!pending.settled) {
        pending.fail(new Failure(reason()));
      }
    }
    this.unresolved.clear();
  }

  clear(): void {
    this.objects.clear();
    this.unresolved.clear();
  }
}
