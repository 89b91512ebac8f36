/**
 * Identity of a named entity, taken verbatim from the dump.
 *
 * Keys are only ever wrapped here; nothing in this project derives a key from a name. Upstream
 * keys can exceed 2^53, so the identity is held as canonical decimal text, never as a float.
 */
export class SymbolKey {
  private constructor(readonly id: string) {}

  /** `id` is an integer or the decimal text of one; `7`, `'7'` and `'007'` name the same key. */
  static of(id: number | string): SymbolKey {
    return new SymbolKey(BigInt(id).toString());
  }

  equals(other: SymbolKey): boolean {
    return this.id === other.id;
  }

  compare(other: SymbolKey): number {
    const a = BigInt(this.id);
    const b = BigInt(other.id);
    return a < b ? -1 : a > b ? 1 : 0;
  }

  toString(): string {
    return `#${this.id}`;
  }
}
