import type { SymbolKey } from '../model/symbolKey';

/** Syntactic role of a node. Only the roles the grammar matches get their own variant. */
export type NodeAnnotation =
  | { kind: 'moduleRoot' }
  | { kind: 'importDecl' }
  | { kind: 'unrecognized'; category: string; subcategory: string };

/** How an identifier occurs at a node. */
export type ContextInfo =
  | { kind: 'use' }
  | { kind: 'import' }
  | { kind: 'dataDecl' }
  | { kind: 'conDecl' }
  | { kind: 'recFieldDecl' }
  | { kind: 'unrecognized'; raw: string };

export type ContextKind = ContextInfo['kind'];

/** A resolved name: upstream identity plus its occurrence name. */
export type Name = {
  key: SymbolKey;
  occName: string;
};

export type Identifier =
  | { kind: 'module'; moduleName: string }
  | { kind: 'name'; name: Name };

/**
 * @typeParam T - type annotation: a raw type-table index before resolution,
 * the resolved symbol list after.
 */
export type IdentifierDetails<T> = {
  type: T | null;
  context: readonly ContextInfo[];
};

export type IdentifierEntry<T> = {
  identifier: Identifier;
  details: IdentifierDetails<T>;
};

export type TreeNode<T> = {
  /** Source span as recorded by the dump, if any. */
  span: string | null;
  annotations: readonly NodeAnnotation[];
  types: readonly T[];
  identifiers: readonly IdentifierEntry<T>[];
  children: readonly TreeNode<T>[];
};

/** One entry of the module type table; `args` index back into the same table. */
export type TypeTerm =
  | { kind: 'var'; name: Name }
  | { kind: 'struct'; label: string | null; args: readonly number[] };

export type ModuleDump = {
  moduleName: string;
  path: string;
  roots: readonly TreeNode<number>[];
  types: readonly TypeTerm[];
};

/** Rewrite every type annotation of a tree, node types and identifier types alike. */
export function mapNodeTypes<A, B>(node: TreeNode<A>, f: (t: A) => B): TreeNode<B> {
  return {
    span: node.span,
    annotations: node.annotations,
    types: node.types.map(f),
    identifiers: node.identifiers.map((e) => ({
      identifier: e.identifier,
      details: { type: e.details.type === null ? null : f(e.details.type), context: e.details.context },
    })),
    children: node.children.map((c) => mapNodeTypes(c, f)),
  };
}
