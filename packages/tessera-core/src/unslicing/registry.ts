// Unslicer registry: maps open types to unslicer factories.
//
// The first index token picks the factory. A factory for a multi-token
// open type returns null until it has seen enough tokens, e.g.
// ["class"] -> null, then ["class", "Point"] -> a PointUnslicer.

import { Violation } from "@tessera/wire";
import type { OpenType } from "@tessera/schema";
import type { Unslicer } from "./unslicer.ts";
import {
  BooleanUnslicer,
  BytesUnslicer,
  DictUnslicer,
  ListUnslicer,
  NoneUnslicer,
  ObjectUnslicer,
  ReferenceUnslicer,
  SetUnslicer,
  TupleUnslicer,
} from "./unslicers.ts";

/**
 * @returns the unslicer, or null if more index tokens are needed
 * @throws Violation if the open type is not acceptable
 */
export type UnslicerFactory = (opentype: OpenType) => Unslicer | null;

export class UnslicerRegistry {
  private readonly factories = new Map<string, UnslicerFactory>();

  /** A registry with the built-in kinds. */
  static standard(): UnslicerRegistry {
    return new UnslicerRegistry()
      .register("none", () => new NoneUnslicer())
      .register("boolean", () => new BooleanUnslicer())
      .register("bytes", () => new BytesUnslicer())
      .register("reference", () => new ReferenceUnslicer())
      .register("list", () => new ListUnslicer())
      .register("tuple", () => new TupleUnslicer())
      .register("set", () => new SetUnslicer())
      .register("dict", () => new DictUnslicer())
      .register("object", () => new ObjectUnslicer());
  }

  /** Register (or replace) the factory for open types starting with `kind`. */
  register(kind: string, factory: UnslicerFactory): this {
    this.factories.set(kind, factory);
    return this;
  }

  /**
   * Register a two-token kind such as ["class", name], with one factory per
   * name.
   */
  registerNamed(kind: string, named: Record<string, () => Unslicer>): this {
    const table = new Map(Object.entries(named));
    return this.register(kind, (opentype) => {
      if (opentype.length < 2) return null;
      const create = table.get(opentype[1]);
      if (!create || opentype.length > 2) {
        throw Violation.unknownOpenType(opentype);
      }
      return create();
    });
  }

  has(kind: string): boolean {
    return this.factories.has(kind);
  }

  create(opentype: OpenType): Unslicer | null {
    const factory = opentype.length > 0 ? this.factories.get(opentype[0]) : undefined;
    if (!factory) {
      throw Violation.unknownOpenType(opentype);
    }
    return factory(opentype);
  }
}
