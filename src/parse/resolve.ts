import type { SymbolKey } from '../model/symbolKey';
import type { TypeTerm } from '../tree/tree';

/**
 * Flatten a (possibly cyclic) type table into the symbols each slot refers to.
 *
 * Every slot is expanded from scratch, depth-first and left to right. Re-entering an index
 * that is still being expanded contributes nothing, so `{0: struct[0]}` resolves to `[]`
 * while a slot shared by two siblings (`{0: var A, 1: struct[0, 0]}`) yields `[A, A]`.
 * Indices outside the table contribute nothing either.
 */
export function resolveTypeTable(table: readonly TypeTerm[]): SymbolKey[][] {
  return table.map((_, index) => resolveTypeIndex(table, index));
}

export function resolveTypeIndex(table: readonly TypeTerm[], index: number): SymbolKey[] {
  const out: SymbolKey[] = [];
  expand(table, index, new Set<number>(), out);
  return out;
}

function expand(table: readonly TypeTerm[], current: number, visiting: Set<number>, out: SymbolKey[]): void {
  if (visiting.has(current)) return;
  const term = table[current];
  if (term === undefined) return;

  if (term.kind === 'var') {
    out.push(term.name.key);
    return;
  }

  visiting.add(current);
  for (const arg of term.args) expand(table, arg, visiting, out);
  visiting.delete(current);
}
