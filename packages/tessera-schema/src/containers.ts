// Container constraints.
//
// Each container constraint accepts its own open type plus `reference`, since
// a shared or cyclic container arrives as a reference the second time it
// is seen. The referenced object is then checked as a value (checkValue).

import { SIZE_LIMIT, TokenType, Violation } from "@tessera/wire";
import {
  Any,
  BaseConstraint,
  type Constraint,
  type ConstraintLike,
  StringConstraint,
  adapt,
} from "./constraint.ts";

/** Default maximum number of elements in a constrained container. */
export const DEFAULT_MAX_LENGTH = 30;

const OPEN_ONLY = new Map<TokenType, number | null>([[TokenType.OPEN, null]]);

export class ListOf extends BaseConstraint {
  readonly name: string;
  readonly item: Constraint;

  constructor(
    item: ConstraintLike,
    readonly maxLength: number = DEFAULT_MAX_LENGTH,
  ) {
    super(OPEN_ONLY, ["list", "reference"]);
    this.item = adapt(item);
    this.name = `ListOf(${this.item.name}, ${maxLength})`;
  }
}

export class SetOf extends BaseConstraint {
  readonly name: string;
  readonly item: Constraint;

  constructor(
    item: ConstraintLike,
    readonly maxLength: number = DEFAULT_MAX_LENGTH,
  ) {
    super(OPEN_ONLY, ["set", "reference"]);
    this.item = adapt(item);
    this.name = `SetOf(${this.item.name}, ${maxLength})`;
  }
}

/** Fixed arity, one constraint per position. */
export class TupleOf extends BaseConstraint {
  readonly name: string;
  readonly items: readonly Constraint[];

  constructor(...items: ConstraintLike[]) {
    super(OPEN_ONLY, ["tuple", "reference"]);
    this.items = items.map(adapt);
    this.name = `TupleOf(${this.items.map((c) => c.name).join(", ")})`;
  }

  /**
   * Constraint for the element at `index`.
   *
   * @throws Violation if the tuple would grow past its arity
   */
  itemAt(index: number): Constraint {
    if (index >= this.items.length) {
      throw Violation.tooMany("tuple elements", this.items.length);
    }
    return this.items[index];
  }
}

export class DictOf extends BaseConstraint {
  readonly name: string;
  readonly key: Constraint;
  readonly value: Constraint;

  constructor(
    key: ConstraintLike,
    value: ConstraintLike,
    readonly maxKeys: number = DEFAULT_MAX_LENGTH,
  ) {
    super(OPEN_ONLY, ["dict", "reference"]);
    this.key = adapt(key);
    this.value = adapt(value);
    this.name = `DictOf(${this.key.name}, ${this.value.name}, ${maxKeys})`;
  }
}

export interface ObjectOfOptions {
  /** Accept keys not named in `fields`. Defaults to false. */
  allowExtra?: boolean;
  /** Constraint for the values of extra keys. Defaults to Any. */
  extra?: ConstraintLike;
  /** Maximum key length in bytes. Defaults to SIZE_LIMIT. */
  maxKeyLength?: number;
  /** Maximum number of keys. Defaults to DEFAULT_MAX_LENGTH. */
  maxKeys?: number;
}

/** Plain objects with named fields. */
export class ObjectOf extends BaseConstraint {
  readonly name: string;
  readonly fields: ReadonlyMap<string, Constraint>;
  readonly allowExtra: boolean;
  readonly extra: Constraint;
  readonly keyConstraint: Constraint;
  readonly maxKeys: number;

  constructor(fields: Record<string, ConstraintLike>, options: ObjectOfOptions = {}) {
    super(OPEN_ONLY, ["object", "reference"]);
    this.fields = new Map(Object.entries(fields).map(([k, v]) => [k, adapt(v)]));
    this.allowExtra = options.allowExtra ?? false;
    this.extra = options.extra === undefined ? Any : adapt(options.extra);
    this.keyConstraint = new StringConstraint(options.maxKeyLength ?? SIZE_LIMIT);
    this.maxKeys = options.maxKeys ?? DEFAULT_MAX_LENGTH;
    this.name = `ObjectOf(${[...this.fields.keys()].join(", ")})`;
  }

  /**
   * Constraint for the value stored under `key`.
   *
   * @throws Violation if the key is not allowed
   */
  fieldConstraint(key: string): Constraint {
    const field = this.fields.get(key);
    if (field) return field;
    if (this.allowExtra) return this.extra;
    throw new Violation(`unknown field ${JSON.stringify(key)}`);
  }
}
