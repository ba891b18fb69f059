// Slicer registry: picks the slicer for an outgoing object.
//
// Application entries are consulted first, newest first, then the
// built-in kinds. An object nothing claims is refused with a Violation.

import { Violation } from "@tessera/wire";
import type { Slicer } from "./slicer.ts";
import {
  BooleanSlicer,
  BytesSlicer,
  DictSlicer,
  ListSlicer,
  NoneSlicer,
  ObjectSlicer,
  PrimitiveSlicer,
  SetSlicer,
  TupleSlicer,
} from "./slicers.ts";

export interface SlicerEntry {
  /** Short name for diagnostics. */
  readonly name: string;
  matches(obj: unknown): boolean;
  create(obj: unknown): Slicer;
}

export class SlicerRegistry {
  private readonly entries: SlicerEntry[] = [];

  /** A registry with only the built-in kinds. */
  static standard(): SlicerRegistry {
    return new SlicerRegistry();
  }

  register(entry: SlicerEntry): this {
    this.entries.unshift(entry);
    return this;
  }

  /** Register a slicer for every instance of a class. */
  registerClass<T extends object>(
    cls: abstract new (...args: never[]) => T,
    create: (obj: T) => Slicer,
  ): this {
    return this.register({
      name: cls.name,
      matches: (obj) => obj instanceof cls,
      create: (obj) => {
        if (!(obj instanceof cls)) {
          throw new TypeError(`expected an instance of ${cls.name}`);
        }
        return create(obj);
      },
    });
  }

  /**
   * @throws Violation if no slicer can handle `obj`
   */
  slicerFor(obj: unknown): Slicer {
    for (const entry of this.entries) {
      if (entry.matches(obj)) return entry.create(obj);
    }
    const builtin = builtinSlicerFor(obj);
    if (!builtin) {
      throw Violation.unsliceable(describeValue(obj));
    }
    return builtin;
  }
}

function builtinSlicerFor(obj: unknown): Slicer | null {
  if (obj === null) return new NoneSlicer(null);
  if (typeof obj === "boolean") return new BooleanSlicer(obj);
  if (typeof obj === "string" || typeof obj === "number" || typeof obj === "bigint") {
    return new PrimitiveSlicer(obj);
  }
  if (typeof obj !== "object") return null;
  if (obj instanceof Uint8Array) return new BytesSlicer(obj);
  if (Array.isArray(obj)) {
    return Object.isFrozen(obj) ? new TupleSlicer(obj) : new ListSlicer(obj);
  }
  if (obj instanceof Map) return new DictSlicer(obj);
  if (obj instanceof Set) return new SetSlicer(obj);
  if (isPlainObject(obj)) return new ObjectSlicer(obj);
  return null;
}

function isPlainObject(obj: object): obj is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(obj);
  return proto === Object.prototype || proto === null;
}

/** Name a value's kind for a refusal message. */
export function describeValue(obj: unknown): string {
  if (obj === undefined) return "undefined";
  if (typeof obj === "function") return `function ${obj.name || "<anonymous>"}`;
  if (typeof obj === "symbol") return obj.toString();
  if (typeof obj === "object" && obj !== null) {
    const ctor: unknown = obj.constructor;
    return typeof ctor === "function" ? `instance of ${ctor.name}` : "object";
  }
  return typeof obj;
}
