import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

import type { DataCon, DataConBody, Module, TopLevelDecl, Uses } from '../model/module';
import { stableStringify } from './deterministicJson';

export type ModuleGraphJson = {
  schema: 'module-graph-v1';
  modules: ModuleJson[];
};

export type ModuleJson = {
  name: string;
  path: string;
  imports: string[];
  decls: DeclJson[];
};

/** Symbol keys are written as decimal strings so identities past 2^53 survive a JSON reader. */
export type KeyJson = string;

export type DeclJson =
  | { kind: 'data'; key: KeyJson; name: string; cons: DataConJson[] }
  | { kind: 'value'; key: KeyJson; name: string; uses: KeyJson[] }
  | { kind: 'class'; key: KeyJson; name: string; methods: { key: KeyJson; name: string; uses: KeyJson[] }[] };

export type DataConJson = {
  key: KeyJson;
  name: string;
  body: { kind: 'record'; fields: { key: KeyJson; name: string; uses: KeyJson[] }[] } | { kind: 'naked'; uses: KeyJson[] };
};

const usesToJson = (uses: Uses): KeyJson[] => uses.map((k) => k.id);

function bodyToJson(body: DataConBody): DataConJson['body'] {
  if (body.kind === 'naked') return { kind: 'naked', uses: usesToJson(body.uses) };
  return {
    kind: 'record',
    fields: body.fields.map((f) => ({ key: f.key.id, name: f.name, uses: usesToJson(f.uses) })),
  };
}

function conToJson(con: DataCon): DataConJson {
  return { key: con.key.id, name: con.name, body: bodyToJson(con.body) };
}

function declToJson(decl: TopLevelDecl): DeclJson {
  switch (decl.kind) {
    case 'data':
      return { kind: 'data', key: decl.data.key.id, name: decl.data.name, cons: decl.data.cons.map(conToJson) };
    case 'value':
      return { kind: 'value', key: decl.value.key.id, name: decl.value.name, uses: usesToJson(decl.value.uses) };
    case 'class':
      return {
        kind: 'class',
        key: decl.class.key.id,
        name: decl.class.name,
        methods: decl.class.methods.map((m) => ({ key: m.key.id, name: m.name, uses: usesToJson(m.uses) })),
      };
  }
}

/**
 * Plain JSON view of parsed modules.
 *
 * Modules are sorted by name, then path. Everything inside a module keeps its parse order.
 */
export function modulesToJson(modules: readonly Module[]): ModuleGraphJson {
  const sorted = modules
    .slice()
    .sort((a, b) => (a.name === b.name ? a.path.localeCompare(b.path) : a.name.localeCompare(b.name)));
  return {
    schema: 'module-graph-v1',
    modules: sorted.map((m) => ({
      name: m.name,
      path: m.path,
      imports: [...m.imports],
      decls: m.decls.map(declToJson),
    })),
  };
}

export type WriteModulesJsonOptions = {
  /** Pretty-print indentation (default 2). */
  space?: number;
};

export function serializeModulesJson(modules: readonly Module[], options: WriteModulesJsonOptions = {}): string {
  return stableStringify(modulesToJson(modules), options.space ?? 2);
}

export async function writeModulesJsonFile(
  filePath: string,
  modules: readonly Module[],
  options: WriteModulesJsonOptions = {},
): Promise<void> {
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, serializeModulesJson(modules, options), 'utf8');
}
