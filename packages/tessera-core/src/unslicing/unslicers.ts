// Built-in unslicers.

import {
  Failure,
  TokenType,
  Violation,
} from "@tessera/wire";
import {
  BooleanConstraint,
  BytesConstraint,
  type Constraint,
  DictOf,
  ListOf,
  ObjectOf,
  SetOf,
  TupleOf,
  checkValue,
} from "@tessera/schema";
import { Pending } from "../references.ts";
import { BaseUnslicer } from "./unslicer.ts";

// ============================================================================
// Mutable containers
// ============================================================================

/**
 * Mutable containers are registered as soon as they open, so children can
 * refer back to them. A child that is still a placeholder fills its slot
 * when it resolves.
 */
export class ListUnslicer extends BaseUnslicer {
  readonly list: unknown[] = [];

  override start(id: number): void {
    super.start(id);
    this.context.setObject(id, this.list);
  }

  protected override childConstraint(): Constraint | null {
    const c = this.constraint;
    if (!(c instanceof ListOf)) return null;
    if (this.list.length >= c.maxLength) {
      throw Violation.tooMany("list elements", c.maxLength);
    }
    return c.item;
  }

  receiveChild(child: unknown): void {
    const value = this.unwrap(child);
    const index = this.list.length;
    this.list.push(undefined);
    this.fillWhenReady(value, (v) => {
      this.list[index] = v;
    });
  }

  receiveClose(): unknown {
    return this.list;
  }

  override describe(): string {
    return `[${this.list.length}]`;
  }
}

export class SetUnslicer extends BaseUnslicer {
  readonly set = new Set<unknown>();
  private count = 0;

  override start(id: number): void {
    super.start(id);
    this.context.setObject(id, this.set);
  }

  protected override childConstraint(): Constraint | null {
    const c = this.constraint;
    if (!(c instanceof SetOf)) return null;
    if (this.count >= c.maxLength) {
      throw Violation.tooMany("set elements", c.maxLength);
    }
    return c.item;
  }

  receiveChild(child: unknown): void {
    const value = this.unwrap(child);
    this.count++;
    this.fillWhenReady(value, (v) => {
      this.set.add(v);
    });
  }

  receiveClose(): unknown {
    return this.set;
  }

  override describe(): string {
    return `[${this.count}]`;
  }
}

export class DictUnslicer extends BaseUnslicer {
  readonly map = new Map<unknown, unknown>();
  private readonly keys = new Set<unknown>();
  private key: unknown = undefined;
  private gettingKey = true;
  private count = 0;

  override start(id: number): void {
    super.start(id);
    this.context.setObject(id, this.map);
  }

  protected override childConstraint(): Constraint | null {
    const c = this.constraint;
    if (!(c instanceof DictOf)) return null;
    if (!this.gettingKey) return c.value;
    if (this.count >= c.maxKeys) {
      throw Violation.tooMany("dict keys", c.maxKeys);
    }
    return c.key;
  }

  receiveChild(child: unknown): void {
    const value = this.unwrap(child);
    if (this.gettingKey) {
      if (!(value instanceof Pending) && this.keys.has(value)) {
        throw new Violation(`duplicate dict key ${describeKey(value)}`);
      }
      this.keys.add(value);
      this.key = value;
      this.gettingKey = false;
      return;
    }

    const key = this.key;
    this.key = undefined;
    this.gettingKey = true;
    this.count++;
    this.fillWhenReady(key, (k) => {
      this.fillWhenReady(value, (v) => {
        this.map.set(k, v);
      });
    });
  }

  receiveClose(): unknown {
    if (!this.gettingKey) {
      throw new Violation(`dict key ${describeKey(this.key)} has no value`);
    }
    return this.map;
  }

  override describe(): string {
    return this.gettingKey ? `{key ${this.count}}` : `{value ${this.count}}`;
  }
}

/**
 * Plain objects. Keys must be strings; fields are defined as own
 * properties, so a key such as `__proto__` is just a field.
 */
export class ObjectUnslicer extends BaseUnslicer {
  readonly obj: Record<string, unknown> = {};
  private readonly fields = new Set<string>();
  private field: string | null = null;
  private count = 0;

  override start(id: number): void {
    super.start(id);
    this.context.setObject(id, this.obj);
  }

  protected override childConstraint(): Constraint | null {
    const c = this.constraint;
    if (!(c instanceof ObjectOf)) return null;
    if (this.field !== null) return c.fieldConstraint(this.field);
    if (this.count >= c.maxKeys) {
      throw Violation.tooMany("object keys", c.maxKeys);
    }
    return c.keyConstraint;
  }

  receiveChild(child: unknown): void {
    const value = this.unwrap(child);
    if (this.field === null) {
      if (typeof value !== "string") {
        throw new Violation(`object keys must be strings, got ${typeof value}`);
      }
      if (this.fields.has(value)) {
        throw new Violation(`duplicate field ${JSON.stringify(value)}`);
      }
      if (this.constraint instanceof ObjectOf) {
        this.constraint.fieldConstraint(value);
      }
      this.fields.add(value);
      this.field = value;
      return;
    }

    const field = this.field;
    this.field = null;
    this.count++;
    this.fillWhenReady(value, (v) => {
      Object.defineProperty(this.obj, field, {
        value: v,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    });
  }

  receiveClose(): unknown {
    if (this.field !== null) {
      throw new Violation(`field ${JSON.stringify(this.field)} has no value`);
    }
    return this.obj;
  }

  override describe(): string {
    return this.field === null ? `{key ${this.count}}` : this.field;
  }
}

// ============================================================================
// Tuples
// ============================================================================

/**
 * Tuples are frozen arrays, so they cannot exist until every element does.
 * A Pending stands in for the tuple in the reference table until then; if
 * an element is itself still pending at CLOSE, the parent gets the Pending.
 */
export class TupleUnslicer extends BaseUnslicer {
  private readonly items: unknown[] = [];
  private readonly placeholder = new Pending<readonly unknown[]>();
  private waiting = 0;
  private closed = false;

  override start(id: number): void {
    super.start(id);
    this.context.setObject(id, this.placeholder);
  }

  protected override childConstraint(): Constraint | null {
    const c = this.constraint;
    return c instanceof TupleOf ? c.itemAt(this.items.length) : null;
  }

  receiveChild(child: unknown): void {
    const value = this.unwrap(child);
    if (!(value instanceof Pending)) {
      this.items.push(value);
      return;
    }
    if (value === this.placeholder) {
      throw new Violation("a tuple cannot contain itself");
    }

    const index = this.items.length;
    this.items.push(undefined);
    this.waiting++;
    value.onSettled((outcome) => {
      if (this.placeholder.settled) return;
      if (!outcome.ok) {
        this.placeholder.fail(outcome.failure);
        return;
      }
      this.items[index] = outcome.value;
      this.waiting--;
      if (this.closed && this.waiting === 0) this.complete();
    });
  }

  receiveClose(): unknown {
    const c = this.constraint;
    if (c instanceof TupleOf && this.items.length < c.items.length) {
      throw new Violation(`tuple of ${this.items.length} elements, expected ${c.items.length}`);
    }
    const result = this.placeholder.result;
    if (result && !result.ok) {
      throw Violation.propagate(result.failure);
    }
    this.closed = true;
    return this.waiting === 0 ? this.complete() : this.placeholder;
  }

  override finish(failure?: Failure): void {
    super.finish(failure);
    if (failure && !this.placeholder.settled) {
      this.placeholder.fail(failure);
    }
  }

  override describe(): string {
    return `[${this.items.length}]`;
  }

  private complete(): readonly unknown[] {
    const tuple = Object.freeze([...this.items]);
    this.placeholder.resolve(tuple);
    return tuple;
  }
}

// ============================================================================
// Wrapped values
// ============================================================================

export class NoneUnslicer extends BaseUnslicer {
  override checkToken(type: TokenType): void {
    throw Violation.tokenRefused("none", type);
  }

  receiveChild(): void {
    throw new Violation("none takes no body");
  }

  receiveClose(): unknown {
    return null;
  }
}

/** `boolean`: one INT, 0 or 1. */
export class BooleanUnslicer extends BaseUnslicer {
  private value: boolean | null = null;

  override checkToken(type: TokenType): void {
    if (this.value !== null) {
      throw Violation.tooMany("boolean values", 1);
    }
    if (type !== TokenType.INT) {
      throw Violation.tokenRefused("boolean", type);
    }
  }

  receiveChild(child: unknown): void {
    if (child !== 0 && child !== 1) {
      throw new Violation(`boolean must be 0 or 1, got ${String(child)}`);
    }
    const value = child === 1;
    const c = this.constraint;
    if (c instanceof BooleanConstraint && c.value !== undefined && c.value !== value) {
      throw new Violation(`${c.name} got ${value}`);
    }
    this.value = value;
  }

  receiveClose(): unknown {
    if (this.value === null) {
      throw new Violation("boolean has no value");
    }
    return this.value;
  }
}

/** `bytes`: one STRING, delivered as a Uint8Array. */
export class BytesUnslicer extends BaseUnslicer {
  override rawStrings = true;
  private value: Uint8Array | null = null;

  override checkToken(type: TokenType, size: number): void {
    if (this.value !== null) {
      throw Violation.tooMany("bytes bodies", 1);
    }
    if (type !== TokenType.STRING) {
      throw Violation.tokenRefused("bytes", type);
    }
    const c = this.constraint;
    if (c instanceof BytesConstraint && size > c.maxLength) {
      throw Violation.tooLong("bytes", size, c.maxLength);
    }
  }

  receiveChild(child: unknown): void {
    if (!(child instanceof Uint8Array)) {
      throw new Violation("bytes body must be a STRING");
    }
    this.value = child;
  }

  receiveClose(): unknown {
    if (this.value === null) {
      throw new Violation("bytes has no body");
    }
    return this.value;
  }
}

/** `reference`: one INT naming an earlier structure. */
export class ReferenceUnslicer extends BaseUnslicer {
  private target: unknown = undefined;
  private received = false;

  override checkToken(type: TokenType): void {
    if (this.received) {
      throw Violation.tooMany("reference ids", 1);
    }
    if (type !== TokenType.INT) {
      throw Violation.tokenRefused("reference", type);
    }
  }

  receiveChild(child: unknown): void {
    if (typeof child !== "number") {
      throw new Violation("reference id must be an INT");
    }
    this.target = this.context.getObject(child);
    this.received = true;
  }

  /**
   * The referenced object, a Pending, or the Failure of an abandoned one.
   * The object was built under whatever constraint held where it first
   * arrived, so it is checked again against this position's.
   */
  receiveClose(): unknown {
    if (!this.received) {
      throw new Violation("reference has no id");
    }
    const target = this.target;
    const c = this.constraint;
    if (c === null || target instanceof Failure) return target;
    if (target instanceof Pending) {
      if (c instanceof ListOf || c instanceof SetOf || c instanceof DictOf || c instanceof ObjectOf) {
        throw new Violation(`${c.name} does not accept an unfinished structure`);
      }
      return target;
    }
    checkValue(c, target);
    return target;
  }
}

function describeKey(key: unknown): string {
  return typeof key === "string" ? JSON.stringify(key) : String(key);
}
