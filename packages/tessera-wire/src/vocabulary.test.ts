import { describe, it, expect } from "vitest";
import { BUILTIN_OPEN_TYPES, Vocabulary } from "./vocabulary.ts";

describe("Vocabulary", () => {
  it("indexes words in order", () => {
    const vocab = new Vocabulary(["alpha", "beta"]);
    expect(vocab.size).toBe(2);
    expect(vocab.indexOf("beta")).toBe(1);
    expect(vocab.wordAt(0)).toBe("alpha");
    expect(vocab.wordAt(2)).toBeUndefined();
    expect(vocab.indexOf("gamma")).toBeUndefined();
  });

  it("accepts sparse explicit indices", () => {
    const vocab = Vocabulary.fromEntries([
      [10, "ten"],
      [3, "three"],
    ]);
    expect(vocab.wordAt(10)).toBe("ten");
    expect(vocab.indexOf("three")).toBe(3);
  });

  it("rejects duplicates", () => {
    expect(() => new Vocabulary(["a", "a"])).toThrow('duplicate vocabulary word: "a"');
    expect(() =>
      Vocabulary.fromEntries([
        [1, "a"],
        [1, "b"],
      ]),
    ).toThrow("duplicate vocabulary index: 1");
  });

  it("holds the built-in open types in the standard table", () => {
    const vocab = Vocabulary.standard();
    expect(vocab.size).toBe(BUILTIN_OPEN_TYPES.length);
    expect(vocab.indexOf("list")).toBe(3);
    expect(vocab.wordAt(2)).toBe("reference");
  });
});
