// Built-in slicers.

import {
  Violation,
  floatToken,
  intToken,
  longIntToken,
  stringToken,
  vocabToken,
} from "@tessera/wire";
import { BaseSlicer, EmitToken, type SliceContext } from "./slicer.ts";

export type Primitive = string | number | bigint;

const LONE_SURROGATE = /\p{Cs}/u;

/**
 * One token, no OPEN/CLOSE.
 *
 * Strings in the vocabulary go out as VOCAB. Safe integers go out as
 * INT/NEG, -0 and other numbers as FLOAT, bigints as LONGINT/LONGNEG.
 * A string with a lone surrogate has no UTF-8 form and is refused.
 */
export class PrimitiveSlicer extends BaseSlicer<Primitive> {
  override sendOpen = false;

  *slice(_streamable: boolean, context: SliceContext): Generator<unknown, void, unknown> {
    const value = this.obj;
    if (typeof value === "string") {
      if (LONE_SURROGATE.test(value)) {
        throw Violation.unsliceable("a string with a lone surrogate");
      }
      const index = context.vocabulary.indexOf(value);
      yield new EmitToken(index === undefined ? stringToken(value) : vocabToken(index));
    } else if (typeof value === "bigint") {
      yield new EmitToken(longIntToken(value));
    } else if (Number.isSafeInteger(value) && !Object.is(value, -0)) {
      yield new EmitToken(intToken(value));
    } else {
      yield new EmitToken(floatToken(value));
    }
  }
}

export class NoneSlicer extends BaseSlicer<null> {
  *slice(): Generator<unknown, void, unknown> {
    yield "none";
  }
}

export class BooleanSlicer extends BaseSlicer<boolean> {
  *slice(): Generator<unknown, void, unknown> {
    yield "boolean";
    yield new EmitToken(intToken(this.obj ? 1 : 0));
  }
}

export class BytesSlicer extends BaseSlicer<Uint8Array> {
  *slice(): Generator<unknown, void, unknown> {
    yield "bytes";
    yield new EmitToken(stringToken(this.obj));
  }
}

// ============================================================================
// Containers
// ============================================================================

/** Slicers for containers that can be referenced, and may stream. */
abstract class ContainerSlicer<T> extends BaseSlicer<T> {
  override trackReferences = true;
  override streamable = true;
  protected index = 0;

  override describe(): string {
    return `[${this.index}]`;
  }
}

export class ListSlicer extends ContainerSlicer<readonly unknown[]> {
  *slice(): Generator<unknown, void, unknown> {
    yield "list";
    for (this.index = 0; this.index < this.obj.length; this.index++) {
      yield this.obj[this.index];
    }
  }
}

/** Frozen arrays. */
export class TupleSlicer extends ContainerSlicer<readonly unknown[]> {
  *slice(): Generator<unknown, void, unknown> {
    yield "tuple";
    for (this.index = 0; this.index < this.obj.length; this.index++) {
      yield this.obj[this.index];
    }
  }
}

export class SetSlicer extends ContainerSlicer<ReadonlySet<unknown>> {
  *slice(): Generator<unknown, void, unknown> {
    yield "set";
    this.index = 0;
    for (const item of this.obj) {
      yield item;
      this.index++;
    }
  }
}

export class DictSlicer extends ContainerSlicer<ReadonlyMap<unknown, unknown>> {
  private inValue = false;

  *slice(): Generator<unknown, void, unknown> {
    yield "dict";
    this.index = 0;
    for (const [key, value] of this.obj) {
      this.inValue = false;
      yield key;
      this.inValue = true;
      yield value;
      this.index++;
    }
  }

  override describe(): string {
    return this.inValue ? `{value ${this.index}}` : `{key ${this.index}}`;
  }
}

/** Plain objects: own enumerable string keys, in insertion order. */
export class ObjectSlicer extends ContainerSlicer<Readonly<Record<string, unknown>>> {
  private field: string | null = null;

  *slice(): Generator<unknown, void, unknown> {
    yield "object";
    this.index = 0;
    for (const [key, value] of Object.entries(this.obj)) {
      this.field = null;
      yield key;
      this.field = key;
      yield value;
      this.index++;
    }
  }

  override describe(): string {
    return this.field === null ? `{key ${this.index}}` : this.field;
  }
}

/** Stands in for an object that already went out as structure `id`. */
export class ReferenceSlicer extends BaseSlicer<unknown> {
  constructor(
    readonly id: number,
    obj: unknown,
  ) {
    super(obj);
  }

  *slice(): Generator<unknown, void, unknown> {
    yield "reference";
    yield new EmitToken(intToken(this.id));
  }
}
