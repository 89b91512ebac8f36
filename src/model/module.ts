import type { SymbolKey } from './symbolKey';

/** Ordered list of symbols a declaration depends on. Duplicates are kept. */
export type Uses = readonly SymbolKey[];

export type RecordField = {
  readonly key: SymbolKey;
  readonly name: string;
  readonly uses: Uses;
};

export type DataConBody =
  | { readonly kind: 'record'; readonly fields: readonly RecordField[] }
  | { readonly kind: 'naked'; readonly uses: Uses };

export type DataCon = {
  readonly key: SymbolKey;
  readonly name: string;
  readonly body: DataConBody;
};

export type DataType = {
  readonly key: SymbolKey;
  readonly name: string;
  readonly cons: readonly DataCon[];
};

/** Placeholder: value declarations are not extracted yet. */
export type ValueDecl = {
  readonly key: SymbolKey;
  readonly name: string;
  readonly uses: Uses;
};

export type ClassMethod = {
  readonly key: SymbolKey;
  readonly name: string;
  readonly uses: Uses;
};

/** Placeholder: class declarations are not extracted yet. */
export type ClassDecl = {
  readonly key: SymbolKey;
  readonly name: string;
  readonly methods: readonly ClassMethod[];
};

export type TopLevelDecl =
  | { readonly kind: 'data'; readonly data: DataType }
  | { readonly kind: 'value'; readonly value: ValueDecl }
  | { readonly kind: 'class'; readonly class: ClassDecl };

export type TopLevelDeclKind = TopLevelDecl['kind'];

export type Module = {
  readonly name: string;
  /** Source path recorded in the dump (posix-style). */
  readonly path: string;
  readonly decls: readonly TopLevelDecl[];
  readonly imports: readonly string[];
};
