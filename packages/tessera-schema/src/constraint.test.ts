// Tests for constraints

import { describe, it, expect } from "vitest";
import { ProtocolError, TokenType, Violation } from "@tessera/wire";
import {
  Any,
  BooleanConstraint,
  ChoiceOf,
  IntegerConstraint,
  Nothing,
  NumberConstraint,
  Optional,
  StringConstraint,
  adapt,
} from "./constraint.ts";
import { DictOf, ListOf, ObjectOf, SetOf, TupleOf } from "./containers.ts";

// ============================================================================
// Primitive constraints
// ============================================================================

describe("StringConstraint", () => {
  const c = new StringConstraint();

  it("accepts STRING up to the limit and VOCAB", () => {
    expect(() => c.checkToken(TokenType.STRING, 1000)).not.toThrow();
    expect(() => c.checkToken(TokenType.VOCAB, 12)).not.toThrow();
  });

  it("rejects a declared size over the limit", () => {
    expect(() => c.checkToken(TokenType.STRING, 1001)).toThrow(
      new Violation("STRING of 1001 bytes exceeds the limit of 1000"),
    );
  });

  it("rejects other token types", () => {
    expect(() => c.checkToken(TokenType.INT, 5)).toThrow(
      "StringConstraint(1000) does not accept INT tokens",
    );
    expect(() => c.checkToken(TokenType.OPEN, 0)).toThrow(Violation);
  });

  it("treats an illegal type byte as a protocol error", () => {
    expect(() => c.checkToken(0x8f, 0)).toThrow(ProtocolError);
  });

  it("refuses every open type", () => {
    expect(() => c.checkOpentype(["list"])).toThrow(
      "StringConstraint(1000) does not accept open type (list)",
    );
  });
});

describe("IntegerConstraint", () => {
  it("accepts only INT and NEG by default", () => {
    const c = new IntegerConstraint();
    expect(() => c.checkToken(TokenType.INT, 99)).not.toThrow();
    expect(() => c.checkToken(TokenType.NEG, 99)).not.toThrow();
    expect(() => c.checkToken(TokenType.LONGINT, 2)).toThrow(
      "IntegerConstraint does not accept LONGINT tokens",
    );
    expect(() => c.checkToken(TokenType.FLOAT, 0)).toThrow(Violation);
  });

  it("bounds long integers by body size", () => {
    const c = new IntegerConstraint(8);
    expect(() => c.checkToken(TokenType.LONGNEG, 8)).not.toThrow();
    expect(() => c.checkToken(TokenType.LONGINT, 9)).toThrow(
      "LONGINT of 9 bytes exceeds the limit of 8",
    );
  });
});

describe("NumberConstraint", () => {
  it("accepts FLOAT as well as integers", () => {
    const c = new NumberConstraint();
    expect(() => c.checkToken(TokenType.FLOAT, 0)).not.toThrow();
    expect(() => c.checkToken(TokenType.INT, 3)).not.toThrow();
    expect(() => c.checkToken(TokenType.STRING, 3)).toThrow(
      "NumberConstraint does not accept STRING tokens",
    );
  });
});

describe("BooleanConstraint and Nothing", () => {
  it("accept their open types only", () => {
    const b = new BooleanConstraint(true);
    expect(b.checkOpentype(["boolean"])).toBe(b);
    expect(() => b.checkOpentype(["none"])).toThrow(Violation);
    expect(Nothing.checkOpentype(["none"])).toBe(Nothing);
    expect(() => Nothing.checkToken(TokenType.INT, 0)).toThrow("Nothing does not accept INT tokens");
  });
});

describe("Any", () => {
  it("accepts every legal token and open type", () => {
    expect(() => Any.checkToken(TokenType.STRING, 10_000_000)).not.toThrow();
    expect(Any.checkOpentype(["class", "Point"])).toBe(Any);
    expect(() => Any.checkToken(0x7f, 0)).toThrow(ProtocolError);
  });
});

// ============================================================================
// Containers
// ============================================================================

describe("ListOf", () => {
  const c = new ListOf(String);

  it("accepts list and reference open types", () => {
    expect(c.checkOpentype(["list"])).toBe(c);
    expect(c.checkOpentype(["reference"])).toBe(c);
    expect(c.item).toBeInstanceOf(StringConstraint);
    expect(c.maxLength).toBe(30);
  });

  it("refuses other open types", () => {
    expect(() => c.checkOpentype(["dict"])).toThrow(
      "ListOf(StringConstraint(1000), 30) does not accept open type (dict)",
    );
  });

  it("accepts only OPEN as a token", () => {
    expect(() => c.checkToken(TokenType.OPEN, 0)).not.toThrow();
    expect(() => c.checkToken(TokenType.STRING, 1)).toThrow(Violation);
  });
});

describe("TupleOf", () => {
  it("hands out positional constraints up to its arity", () => {
    const c = new TupleOf(String, new IntegerConstraint());
    expect(c.itemAt(1)).toBeInstanceOf(IntegerConstraint);
    expect(() => c.itemAt(2)).toThrow("more than 2 tuple elements");
  });
});

describe("SetOf and DictOf", () => {
  it("accept their open types", () => {
    const s = new SetOf(Number, 4);
    const d = new DictOf(String, Number);
    expect(s.checkOpentype(["set"])).toBe(s);
    expect(d.checkOpentype(["dict"])).toBe(d);
    expect(() => d.checkOpentype(["set"])).toThrow(Violation);
    expect(d.maxKeys).toBe(30);
  });
});

describe("ObjectOf", () => {
  it("looks up field constraints by name", () => {
    const c = new ObjectOf({ name: String, age: Number });
    expect(c.fieldConstraint("name")).toBeInstanceOf(StringConstraint);
    expect(() => c.fieldConstraint("email")).toThrow('unknown field "email"');
  });

  it("accepts extra fields when allowed", () => {
    const c = new ObjectOf({ name: String }, { allowExtra: true });
    expect(c.fieldConstraint("anything")).toBe(Any);
  });
});

// ============================================================================
// Alternatives and shorthand
// ============================================================================

describe("ChoiceOf", () => {
  const list = new ListOf(Number);
  const c = new ChoiceOf(String, list);

  it("accepts a token any alternative accepts", () => {
    expect(() => c.checkToken(TokenType.STRING, 10)).not.toThrow();
    expect(() => c.checkToken(TokenType.OPEN, 0)).not.toThrow();
  });

  it("reports the first refusal when no alternative accepts", () => {
    expect(() => c.checkToken(TokenType.FLOAT, 0)).toThrow(
      "StringConstraint(1000) does not accept FLOAT tokens",
    );
  });

  it("selects the alternative that accepts the open type", () => {
    expect(c.checkOpentype(["list"])).toBe(list);
    expect(() => c.checkOpentype(["set"])).toThrow(Violation);
  });
});

describe("Optional", () => {
  it("adds Nothing as an alternative", () => {
    const c = Optional(String);
    expect(c.checkOpentype(["none"])).toBe(Nothing);
    expect(() => c.checkToken(TokenType.STRING, 3)).not.toThrow();
  });
});

describe("adapt", () => {
  it("maps shorthand to constraints", () => {
    expect(adapt(null)).toBe(Nothing);
    expect(adapt(String)).toBeInstanceOf(StringConstraint);
    expect(adapt(Number)).toBeInstanceOf(NumberConstraint);
    expect(adapt(Boolean)).toBeInstanceOf(BooleanConstraint);
    expect(adapt(BigInt)).toBeInstanceOf(IntegerConstraint);
    expect(adapt(Any)).toBe(Any);
  });
});
