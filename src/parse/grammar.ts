import type { SymbolKey } from '../model/symbolKey';
import type {
  ClassDecl,
  DataCon,
  DataConBody,
  DataType,
  Module,
  RecordField,
  TopLevelDecl,
  ValueDecl,
} from '../model/module';
import {
  alt,
  chain,
  empty,
  map,
  matched,
  pMany,
  pOne,
  pSome,
  then,
  type Parsed,
  type TreeParser,
} from './treeParser';
import {
  annotation,
  children,
  hasContext,
  identifiers,
  noAnnotation,
  pUniqueNameChild,
  type AstParser,
  type ResolvedEntry,
  type ResolvedNode,
} from './astParser';

/** Module header plus its root forest, types already resolved. */
export type ResolvedModuleSource = {
  moduleName: string;
  path: string;
  roots: readonly ResolvedNode[];
};

type ModuleItem = { kind: 'import'; moduleName: string } | { kind: 'decl'; decl: TopLevelDecl };

// ---------------------------------------------------------------------------
// Module

export const pModule: TreeParser<ResolvedModuleSource, Module> = (src) => {
  const body = pOne((s: ResolvedModuleSource) => s.roots, pModuleRoot)(src);
  if (body === null) return null;
  return matched({ name: src.moduleName, path: src.path, ...body.value });
};

const pModuleItem: AstParser<ModuleItem> = alt<ResolvedNode, ModuleItem>(
  map(pImport(), (moduleName): ModuleItem => ({ kind: 'import', moduleName })),
  map(pTopLevelDecl(), (decl): ModuleItem => ({ kind: 'decl', decl })),
);

/** Children that are neither an import nor a known declaration are dropped. */
export const pModuleRoot: AstParser<Pick<Module, 'imports' | 'decls'>> = then(
  annotation('moduleRoot'),
  map(pMany(children, pModuleItem), (items) => {
    const imports: string[] = [];
    const decls: TopLevelDecl[] = [];
    for (const item of items) {
      if (item.kind === 'import') imports.push(item.moduleName);
      else decls.push(item.decl);
    }
    return { imports, decls };
  }),
);

// ---------------------------------------------------------------------------
// Imports

function importedModuleName(entry: ResolvedEntry): Parsed<string> {
  const { identifier, details } = entry;
  if (identifier.kind !== 'module' || !hasContext(details.context, 'import')) return null;
  return matched(identifier.moduleName);
}

export function pImport(): AstParser<string> {
  return then(
    annotation('importDecl'),
    pOne(children, then(noAnnotation, pOne(identifiers, importedModuleName))),
  );
}

// ---------------------------------------------------------------------------
// Top-level declarations

export function pTopLevelDecl(): AstParser<TopLevelDecl> {
  return alt<ResolvedNode, TopLevelDecl>(
    map(pData(), (data): TopLevelDecl => ({ kind: 'data', data })),
    map(pValue(), (value): TopLevelDecl => ({ kind: 'value', value })),
    map(pClass(), (cls): TopLevelDecl => ({ kind: 'class', class: cls })),
  );
}

export function pData(): AstParser<DataType> {
  return chain(pUniqueNameChild('dataDecl'), ({ key, name }) =>
    map(pMany(children, pDataCon()), (cons): DataType => ({ key, name, cons })),
  );
}

export function pDataCon(): AstParser<DataCon> {
  return chain(pUniqueNameChild('conDecl'), ({ key, name }) =>
    map(pDataConBody(), (body): DataCon => ({ key, name, body })),
  );
}

/** Record syntax if one child holds the fields, otherwise everything the constructor mentions. */
export function pDataConBody(): AstParser<DataConBody> {
  return alt<ResolvedNode, DataConBody>(
    pOne(
      children,
      map(pSome(children, pRecordField()), (fields): DataConBody => ({ kind: 'record', fields })),
    ),
    map(pUses, (uses): DataConBody => ({ kind: 'naked', uses })),
  );
}

export function pRecordField(): AstParser<RecordField> {
  return chain(pUniqueNameChild('recFieldDecl'), ({ key, name }) =>
    map(pUses, (uses): RecordField => ({ key, name, uses })),
  );
}

// TODO: extract value bindings with their use-lists once dumps expose the binding groups.
export function pValue(): AstParser<ValueDecl> {
  return empty();
}

export function pClass(): AstParser<ClassDecl> {
  return empty();
}

// ---------------------------------------------------------------------------
// Uses

/** Everything the subtree refers to, in pre-order. Never fails. */
export function pUses(node: ResolvedNode): Parsed<SymbolKey[]> {
  return matched(collectUses(node));
}

export function collectUses(node: ResolvedNode, out: SymbolKey[] = []): SymbolKey[] {
  for (const keys of node.types) out.push(...keys);
  for (const entry of node.identifiers) {
    const { identifier, details } = entry;
    if (identifier.kind !== 'name' || !hasContext(details.context, 'use')) continue;
    out.push(identifier.name.key);
    if (details.type !== null) out.push(...details.type);
  }
  for (const child of node.children) collectUses(child, out);
  return out;
}
