// Tests for checking built values against constraints

import { describe, it, expect } from "vitest";
import { Violation } from "@tessera/wire";
import { Any, ChoiceOf, IntegerConstraint, StringConstraint } from "./constraint.ts";
import { DictOf, ListOf, ObjectOf, TupleOf } from "./containers.ts";
import { checkValue } from "./conforms.ts";

describe("checkValue", () => {
  it("accepts a list whose items fit", () => {
    expect(() => checkValue(new ListOf(String), ["a", "b"])).not.toThrow();
  });

  it("names the kind of value an item constraint refused", () => {
    expect(() => checkValue(new ListOf(String), [["a"]])).toThrow(
      "StringConstraint(1000) does not accept list",
    );
    expect(() => checkValue(new ListOf(String), [1])).toThrow(Violation);
  });

  it("applies container limits", () => {
    expect(() => checkValue(new ListOf(String, 1), ["a", "b"])).toThrow("more than 1 list elements");
    expect(() => checkValue(new StringConstraint(2), "abc")).toThrow(
      "STRING of 3 bytes exceeds the limit of 2",
    );
  });

  it("tells tuples from lists by whether they are frozen", () => {
    const c = new TupleOf(String, String);
    expect(() => checkValue(c, Object.freeze(["a", "b"]))).not.toThrow();
    expect(() => checkValue(c, ["a", "b"])).toThrow(
      "TupleOf(StringConstraint(1000), StringConstraint(1000)) does not accept list",
    );
    expect(() => checkValue(c, Object.freeze(["a"]))).toThrow("tuple of 1 elements, expected 2");
  });

  it("checks dict keys and values", () => {
    const c = new DictOf(String, new IntegerConstraint());
    expect(() => checkValue(c, new Map([["a", 1]]))).not.toThrow();
    expect(() => checkValue(c, new Map([["a", 1.5]]))).toThrow("IntegerConstraint does not accept number");
  });

  it("checks object fields by name", () => {
    const c = new ObjectOf({ name: String });
    expect(() => checkValue(c, { name: "x" })).not.toThrow();
    expect(() => checkValue(c, { age: 1 })).toThrow('unknown field "age"');
  });

  it("accepts a bigint only within an integer constraint's byte limit", () => {
    const c = new IntegerConstraint(8);
    expect(() => checkValue(c, 2n ** 63n)).not.toThrow();
    expect(() => checkValue(c, 2n ** 64n)).toThrow("IntegerConstraint(8) does not accept bigint");
  });

  it("tries each alternative of a choice", () => {
    const c = new ChoiceOf(String, null);
    expect(() => checkValue(c, null)).not.toThrow();
    expect(() => checkValue(c, 3)).toThrow("ChoiceOf(StringConstraint(1000), Nothing) does not accept number");
  });

  it("accepts slots still waiting on a placeholder", () => {
    expect(() => checkValue(new ListOf(String), [undefined])).not.toThrow();
  });

  it("checks a self-containing list at each level of the constraint", () => {
    const list: unknown[] = ["a"];
    list.push(list);
    expect(() => checkValue(new ListOf(Any), list)).not.toThrow();
    const nested: unknown[] = [];
    nested.push(nested);
    const c = new ListOf(new ListOf(String));
    expect(() => checkValue(c, nested)).toThrow("StringConstraint(1000) does not accept list");
  });
});
