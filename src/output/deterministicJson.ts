/**
 * Deterministic JSON stringify:
 * - Sorts object keys recursively
 * - Preserves array order (arrays carry meaning here and are never reordered)
 */
export function stableStringify(value: unknown, space: number = 2): string {
  return JSON.stringify(sortKeysDeep(value), null, space) + '\n';
}

function sortKeysDeep(v: unknown): unknown {
  if (v === null || v === undefined) return v;
  if (Array.isArray(v)) return v.map(sortKeysDeep);
  if (typeof v !== 'object') return v;

  const out: Record<string, unknown> = {};
  for (const [k, value] of Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    out[k] = sortKeysDeep(value);
  }
  return out;
}
