import type { Module } from '../model/module';
import type { SymbolKey } from '../model/symbolKey';
import { mapNodeTypes, type ModuleDump } from '../tree/tree';
import { pModule, type ResolvedModuleSource } from './grammar';
import { resolveTypeTable } from './resolve';
import { runParser } from './treeParser';

/**
 * Replace raw type-table indices throughout the module's trees with the symbols they resolve to.
 * The table is resolved once per module.
 */
export function resolveModuleDump(dump: ModuleDump): ResolvedModuleSource {
  const resolved = resolveTypeTable(dump.types);
  const lookup = (index: number): SymbolKey[] => resolved[index] ?? [];
  return {
    moduleName: dump.moduleName,
    path: dump.path,
    roots: dump.roots.map((root) => mapNodeTypes(root, lookup)),
  };
}

/** Parse one module dump. `null` when the dump does not have exactly one module root that parses. */
export function parseModuleDump(dump: ModuleDump): Module | null {
  return runParser(pModule, resolveModuleDump(dump));
}
