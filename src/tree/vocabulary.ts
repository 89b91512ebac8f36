import type { ContextInfo, ContextKind, NodeAnnotation } from './tree';

type KnownContextKind = Exclude<ContextKind, 'unrecognized'>;

/**
 * Annotation and context tags as they appear in interface dumps.
 * Tags not listed here are kept as `unrecognized` so a node still counts as annotated.
 */
const ANNOTATIONS = new Map<string, 'moduleRoot' | 'importDecl'>([
  ['Module/Module', 'moduleRoot'],
  ['ImportDecl/ImportDecl', 'importDecl'],
]);

const CONTEXTS = new Map<string, KnownContextKind>([
  ['Use', 'use'],
  ['IEThing Import', 'import'],
  ['Decl DataDec', 'dataDecl'],
  ['Decl ConDec', 'conDecl'],
  ['RecField RecFieldDecl', 'recFieldDecl'],
]);

export function classifyAnnotation(category: string, subcategory: string): NodeAnnotation {
  const kind = ANNOTATIONS.get(`${category}/${subcategory}`);
  return kind ? { kind } : { kind: 'unrecognized', category, subcategory };
}

/** Context strings are whitespace-normalized before lookup (`Decl  DataDec` == `Decl DataDec`). */
export function classifyContext(raw: string): ContextInfo {
  const kind = CONTEXTS.get(raw.trim().split(/\s+/).join(' '));
  return kind ? { kind } : { kind: 'unrecognized', raw };
}

export function describeAnnotation(a: NodeAnnotation): string {
  switch (a.kind) {
    case 'moduleRoot':
      return 'Module/Module';
    case 'importDecl':
      return 'ImportDecl/ImportDecl';
    case 'unrecognized':
      return `${a.category}/${a.subcategory}`;
  }
}

export function describeContext(c: ContextInfo): string {
  if (c.kind === 'unrecognized') return c.raw;
  for (const [raw, kind] of CONTEXTS) {
    if (kind === c.kind) return raw;
  }
  return c.kind;
}
