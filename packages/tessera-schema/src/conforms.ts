// Checking an already-built value against a constraint.
//
// Tokens are checked as they arrive, but a `reference` delivers an object
// that was built earlier, possibly under another constraint or none. Its
// value is checked here instead. Cycles are accepted the second time a
// (value, constraint) pair is reached.

import { Violation, encodeUtf8 } from "@tessera/wire";
import {
  AnyConstraint,
  BooleanConstraint,
  BytesConstraint,
  ChoiceOf,
  type Constraint,
  IntegerConstraint,
  NothingConstraint,
  NumberConstraint,
  StringConstraint,
} from "./constraint.ts";
import { DictOf, ListOf, ObjectOf, SetOf, TupleOf } from "./containers.ts";

/**
 * @throws Violation if `value` could not have been received under
 *   `constraint`. `undefined` marks a slot still waiting for its
 *   placeholder and is accepted. Constraints from outside this package
 *   accept everything.
 */
export function checkValue(constraint: Constraint, value: unknown): void {
  check(constraint, value, new Visits());
}

class Visits {
  private readonly pairs = new Map<object, Set<Constraint>>();
  private readonly entered: Array<[object, Constraint]> = [];

  /** @returns false if the pair was already entered */
  enter(value: object, constraint: Constraint): boolean {
    let seen = this.pairs.get(value);
    if (!seen) {
      seen = new Set();
      this.pairs.set(value, seen);
    }
    if (seen.has(constraint)) return false;
    seen.add(constraint);
    this.entered.push([value, constraint]);
    return true;
  }

  mark(): number {
    return this.entered.length;
  }

  /** Forget pairs entered by an alternative that failed. */
  rollback(mark: number): void {
    while (this.entered.length > mark) {
      const entry = this.entered.pop();
      if (entry) this.pairs.get(entry[0])?.delete(entry[1]);
    }
  }
}

function check(c: Constraint, value: unknown, visits: Visits): void {
  if (value === undefined) return;
  if (typeof value === "object" && value !== null && !visits.enter(value, c)) return;

  if (c instanceof ChoiceOf) {
    for (const alternative of c.alternatives) {
      const mark = visits.mark();
      try {
        check(alternative, value, visits);
        return;
      } catch (e) {
        if (!(e instanceof Violation)) throw e;
        visits.rollback(mark);
      }
    }
    throw refused(c, value);
  }

  if (c instanceof AnyConstraint) return;

  if (c instanceof StringConstraint) {
    if (typeof value !== "string") throw refused(c, value);
    const size = encodeUtf8(value).length;
    if (size > c.maxLength) throw Violation.tooLong("STRING", size, c.maxLength);
    return;
  }
  if (c instanceof IntegerConstraint || c instanceof NumberConstraint) {
    if (typeof value === "number") {
      if (c instanceof IntegerConstraint && !Number.isSafeInteger(value)) throw refused(c, value);
      return;
    }
    if (typeof value === "bigint" && c.maxBytes > 0 && magnitudeBytes(value) <= c.maxBytes) return;
    throw refused(c, value);
  }
  if (c instanceof BooleanConstraint) {
    if (typeof value !== "boolean") throw refused(c, value);
    if (c.value !== undefined && c.value !== value) throw new Violation(`${c.name} got ${value}`);
    return;
  }
  if (c instanceof BytesConstraint) {
    if (!(value instanceof Uint8Array)) throw refused(c, value);
    if (value.length > c.maxLength) throw Violation.tooLong("bytes", value.length, c.maxLength);
    return;
  }
  if (c instanceof NothingConstraint) {
    if (value !== null) throw refused(c, value);
    return;
  }

  if (c instanceof ListOf) {
    if (!Array.isArray(value) || Object.isFrozen(value)) throw refused(c, value);
    if (value.length > c.maxLength) throw Violation.tooMany("list elements", c.maxLength);
    for (const item of value) check(c.item, item, visits);
    return;
  }
  if (c instanceof TupleOf) {
    if (!Array.isArray(value) || !Object.isFrozen(value)) throw refused(c, value);
    if (value.length !== c.items.length) {
      throw new Violation(`tuple of ${value.length} elements, expected ${c.items.length}`);
    }
    value.forEach((item: unknown, i) => check(c.itemAt(i), item, visits));
    return;
  }
  if (c instanceof SetOf) {
    if (!(value instanceof Set)) throw refused(c, value);
    if (value.size > c.maxLength) throw Violation.tooMany("set elements", c.maxLength);
    for (const item of value) check(c.item, item, visits);
    return;
  }
  if (c instanceof DictOf) {
    if (!(value instanceof Map)) throw refused(c, value);
    if (value.size > c.maxKeys) throw Violation.tooMany("dict keys", c.maxKeys);
    for (const [k, v] of value) {
      check(c.key, k, visits);
      check(c.value, v, visits);
    }
    return;
  }
  if (c instanceof ObjectOf) {
    if (!isPlainObject(value)) throw refused(c, value);
    const entries = Object.entries(value);
    if (entries.length > c.maxKeys) throw Violation.tooMany("object keys", c.maxKeys);
    for (const [key, field] of entries) {
      check(c.fieldConstraint(key), field, visits);
    }
  }
}

function refused(c: Constraint, value: unknown): Violation {
  return new Violation(`${c.name} does not accept ${kindOf(value)}`);
}

/** The open type a value would have been received as. */
function kindOf(value: unknown): string {
  if (value === null) return "none";
  if (Array.isArray(value)) return Object.isFrozen(value) ? "tuple" : "list";
  if (value instanceof Uint8Array) return "bytes";
  if (value instanceof Set) return "set";
  if (value instanceof Map) return "dict";
  return typeof value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function magnitudeBytes(value: bigint): number {
  const hex = (value < 0n ? -value : value).toString(16);
  return Math.ceil(hex.length / 2);
}
