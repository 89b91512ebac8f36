import type { SymbolKey } from '../model/symbolKey';
import type { ContextInfo, ContextKind, IdentifierEntry, NodeAnnotation, TreeNode } from '../tree/tree';
import { matched, pCheck, pOne, type TreeParser } from './treeParser';

/** A tree whose type annotations have been resolved to symbol lists. */
export type ResolvedNode = TreeNode<SymbolKey[]>;

export type ResolvedEntry = IdentifierEntry<SymbolKey[]>;

export type AstParser<A> = TreeParser<ResolvedNode, A>;

export type KeyedName = { key: SymbolKey; name: string };

export const children = (n: ResolvedNode): readonly ResolvedNode[] => n.children;

export const identifiers = (n: ResolvedNode): readonly ResolvedEntry[] => n.identifiers;

export function annotation(kind: Exclude<NodeAnnotation['kind'], 'unrecognized'>): AstParser<void> {
  return pCheck((n) => n.annotations.some((a) => a.kind === kind));
}

export const noAnnotation: AstParser<void> = pCheck((n) => n.annotations.length === 0);

export function hasContext(context: readonly ContextInfo[], kind: ContextKind): boolean {
  return context.some((c) => c.kind === kind);
}

/** The single resolved name at this node whose usage context satisfies `accepts`. */
export function pName(accepts: (context: readonly ContextInfo[]) => boolean): AstParser<KeyedName> {
  return pOne(identifiers, (entry: ResolvedEntry) =>
    entry.identifier.kind === 'name' && accepts(entry.details.context)
      ? matched({ key: entry.identifier.name.key, name: entry.identifier.name.occName })
      : null,
  );
}

/** The single child that declares a name of the given kind. */
export function pUniqueNameChild(kind: ContextKind): AstParser<KeyedName> {
  return pOne(children, pName((context) => hasContext(context, kind)));
}
