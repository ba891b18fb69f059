// Constraint types for bounding and shaping incoming token streams.
//
// A constraint is attached to one position in the structure tree. The
// unslicer at that position asks it about every token before the token's
// body is buffered, and about the open type of every child structure before
// the child's unslicer is attached.
//
// Constraints are immutable and shared between every node they validate.

import {
  ProtocolError,
  SIZE_LIMIT,
  TokenType,
  Violation,
  isTokenType,
  tokenName,
} from "@tessera/wire";

/** The index tokens naming the kind of a structure, e.g. ["list"]. */
export type OpenType = readonly string[];

export interface Constraint {
  /** Short description used in diagnostics. */
  readonly name: string;

  /**
   * Check a token header before its body is read.
   *
   * @throws Violation if the token does not conform
   * @throws ProtocolError if the type byte is not a legal token type
   */
  checkToken(type: number, size: number): void;

  /**
   * Check the open type of a structure about to be built in this position.
   *
   * @returns the constraint to attach to the new structure's unslicer
   * @throws Violation if this kind of structure is not acceptable here
   */
  checkOpentype(opentype: OpenType): Constraint;
}

/** Maximum body size per accepted token type; null for no limit. */
export type Taster = ReadonlyMap<TokenType, number | null>;

/**
 * Constraint driven by a taster table and a list of accepted open types.
 */
export abstract class BaseConstraint implements Constraint {
  abstract readonly name: string;

  protected constructor(
    protected readonly taster: Taster,
    protected readonly opentypes: readonly string[] = [],
  ) {}

  checkToken(type: number, size: number): void {
    if (!isTokenType(type)) {
      throw ProtocolError.unknownTokenType(type);
    }
    if (!this.taster.has(type)) {
      throw Violation.tokenRefused(this.name, type);
    }
    const limit = this.taster.get(type);
    if (limit !== null && limit !== undefined && size > limit) {
      throw Violation.tooLong(tokenName(type), size, limit);
    }
  }

  checkOpentype(opentype: OpenType): Constraint {
    if (opentype.length === 0 || !this.opentypes.includes(opentype[0])) {
      throw Violation.openTypeRefused(this.name, opentype);
    }
    return this;
  }
}

// ============================================================================
// Any
// ============================================================================

/** Accepts every legal token and every open type. */
export class AnyConstraint implements Constraint {
  readonly name = "Any";

  checkToken(type: number, _size: number): void {
    if (!isTokenType(type)) {
      throw ProtocolError.unknownTokenType(type);
    }
  }

  checkOpentype(_opentype: OpenType): Constraint {
    return this;
  }
}

export const Any: Constraint = new AnyConstraint();

// ============================================================================
// Primitive constraints
// ============================================================================

export class StringConstraint extends BaseConstraint {
  readonly name: string;

  constructor(readonly maxLength: number = SIZE_LIMIT) {
    super(
      new Map<TokenType, number | null>([
        [TokenType.STRING, maxLength],
        [TokenType.VOCAB, null],
      ]),
    );
    this.name = `StringConstraint(${maxLength})`;
  }
}

/**
 * Integers. With `maxBytes` of -1 only INT and NEG are accepted; otherwise
 * LONGINT and LONGNEG bodies up to `maxBytes` long are accepted too.
 */
export class IntegerConstraint extends BaseConstraint {
  readonly name: string;

  constructor(readonly maxBytes: number = -1) {
    super(integerTaster(maxBytes));
    this.name = maxBytes < 0 ? "IntegerConstraint" : `IntegerConstraint(${maxBytes})`;
  }
}

/** Integers as for IntegerConstraint, plus FLOAT. */
export class NumberConstraint extends BaseConstraint {
  readonly name: string;

  constructor(readonly maxBytes: number = -1) {
    const taster = new Map(integerTaster(maxBytes));
    taster.set(TokenType.FLOAT, null);
    super(taster);
    this.name = maxBytes < 0 ? "NumberConstraint" : `NumberConstraint(${maxBytes})`;
  }
}

function integerTaster(maxBytes: number): Map<TokenType, number | null> {
  const taster = new Map<TokenType, number | null>([
    [TokenType.INT, null],
    [TokenType.NEG, null],
  ]);
  if (maxBytes > 0) {
    taster.set(TokenType.LONGINT, maxBytes);
    taster.set(TokenType.LONGNEG, maxBytes);
  }
  return taster;
}

const OPEN_ONLY: Taster = new Map<TokenType, number | null>([[TokenType.OPEN, null]]);

/** A `boolean` structure, optionally pinned to one value. */
export class BooleanConstraint extends BaseConstraint {
  readonly name: string;

  constructor(readonly value?: boolean) {
    super(OPEN_ONLY, ["boolean"]);
    this.name = value === undefined ? "BooleanConstraint" : `BooleanConstraint(${value})`;
  }
}

/** A `bytes` structure whose body is at most `maxLength` bytes. */
export class BytesConstraint extends BaseConstraint {
  readonly name: string;

  constructor(readonly maxLength: number = SIZE_LIMIT) {
    super(OPEN_ONLY, ["bytes"]);
    this.name = `BytesConstraint(${maxLength})`;
  }
}

/** Only `none`. */
export class NothingConstraint extends BaseConstraint {
  readonly name = "Nothing";

  constructor() {
    super(OPEN_ONLY, ["none"]);
  }
}

export const Nothing: Constraint = new NothingConstraint();

// ============================================================================
// Alternatives
// ============================================================================

/** Accepts whatever any one of its alternatives accepts. */
export class ChoiceOf implements Constraint {
  readonly name: string;
  readonly alternatives: readonly Constraint[];

  constructor(...alternatives: ConstraintLike[]) {
    this.alternatives = alternatives.map(adapt);
    this.name = `ChoiceOf(${this.alternatives.map((c) => c.name).join(", ")})`;
  }

  checkToken(type: number, size: number): void {
    let refusal: Violation | null = null;
    for (const alternative of this.alternatives) {
      try {
        alternative.checkToken(type, size);
        return;
      } catch (e) {
        if (!(e instanceof Violation)) throw e;
        refusal ??= e;
      }
    }
    throw refusal ?? Violation.tokenRefused(this.name, type);
  }

  checkOpentype(opentype: OpenType): Constraint {
    for (const alternative of this.alternatives) {
      try {
        return alternative.checkOpentype(opentype);
      } catch (e) {
        if (!(e instanceof Violation)) throw e;
      }
    }
    throw Violation.openTypeRefused(this.name, opentype);
  }
}

export function Optional(constraint: ConstraintLike): ChoiceOf {
  return new ChoiceOf(constraint, Nothing);
}

// ============================================================================
// Shorthand
// ============================================================================

/**
 * Anything `adapt` understands: a constraint, one of the `String`,
 * `Number`, `Boolean` or `BigInt` constructors, or `null` for Nothing.
 */
export type ConstraintLike =
  | Constraint
  | StringConstructor
  | NumberConstructor
  | BooleanConstructor
  | BigIntConstructor
  | null;

export function adapt(value: ConstraintLike): Constraint {
  if (value === null) return Nothing;
  if (value === String) return new StringConstraint();
  if (value === Number) return new NumberConstraint();
  if (value === Boolean) return new BooleanConstraint();
  if (value === BigInt) return new IntegerConstraint(SIZE_LIMIT);
  if (isConstraint(value)) return value;
  throw new TypeError(`not a constraint: ${String(value)}`);
}

export function isConstraint(value: unknown): value is Constraint {
  return (
    typeof value === "object" &&
    value !== null &&
    "checkToken" in value &&
    "checkOpentype" in value &&
    typeof value.checkToken === "function" &&
    typeof value.checkOpentype === "function"
  );
}
