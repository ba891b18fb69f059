// Pre-agreed vocabulary table for VOCAB tokens.
//
// Both peers must hold the same table. How they agree on it is up to the
// layer that owns the session; the table is passed in as configuration.

/** Names of the built-in open types. */
export const BUILTIN_OPEN_TYPES = [
  "none",
  "boolean",
  "reference",
  "list",
  "tuple",
  "set",
  "dict",
  "object",
  "bytes",
] as const;

/**
 * Bidirectional index ↔ string mapping.
 *
 * Immutable once built.
 */
export class Vocabulary {
  private readonly byIndex = new Map<number, string>();
  private readonly byWord = new Map<string, number>();

  /**
   * @param words - words in index order, starting at 0
   */
  constructor(words: Iterable<string> = []) {
    let index = 0;
    for (const word of words) {
      this.add(index++, word);
    }
  }

  /** Build a table with explicit (possibly sparse) indices. */
  static fromEntries(entries: Iterable<readonly [number, string]>): Vocabulary {
    const vocab = new Vocabulary();
    for (const [index, word] of entries) {
      vocab.add(index, word);
    }
    return vocab;
  }

  /** A table holding the built-in open type names. */
  static standard(): Vocabulary {
    return new Vocabulary(BUILTIN_OPEN_TYPES);
  }

  private add(index: number, word: string): void {
    if (!Number.isSafeInteger(index) || index < 0) {
      throw new RangeError(`vocabulary index must be a non-negative integer, got ${index}`);
    }
    if (this.byWord.has(word)) {
      throw new RangeError(`duplicate vocabulary word: ${JSON.stringify(word)}`);
    }
    if (this.byIndex.has(index)) {
      throw new RangeError(`duplicate vocabulary index: ${index}`);
    }
    this.byIndex.set(index, word);
    this.byWord.set(word, index);
  }

  get size(): number {
    return this.byIndex.size;
  }

  indexOf(word: string): number | undefined {
    return this.byWord.get(word);
  }

  wordAt(index: number): string | undefined {
    return this.byIndex.get(index);
  }
}
