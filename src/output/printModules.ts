import type { DataCon, Module, TopLevelDecl, Uses } from '../model/module';
import type { IdentifierEntry, ModuleDump, TreeNode, TypeTerm } from '../tree/tree';
import { describeAnnotation, describeContext } from '../tree/vocabulary';

/** Indented line buffer for the debug dumps. */
class Printer {
  private readonly lines: string[] = [];
  private depth = 0;

  line(text: string): void {
    this.lines.push(`${'  '.repeat(this.depth)}${text}`);
  }

  indent(body: () => void): void {
    this.depth++;
    body();
    this.depth--;
  }

  toString(): string {
    return this.lines.join('\n') + '\n';
  }
}

const fmtUses = (uses: Uses): string => (uses.length ? uses.map(String).join(' ') : '-');

function printCon(p: Printer, con: DataCon): void {
  if (con.body.kind === 'naked') {
    p.line(`${con.name} ${con.key}: ${fmtUses(con.body.uses)}`);
    return;
  }
  const { fields } = con.body;
  p.line(`${con.name} ${con.key} {`);
  p.indent(() => {
    for (const f of fields) p.line(`${f.name} ${f.key}: ${fmtUses(f.uses)}`);
  });
  p.line('}');
}

function printDecl(p: Printer, decl: TopLevelDecl): void {
  switch (decl.kind) {
    case 'data': {
      const { data } = decl;
      p.line(`data ${data.name} ${data.key}`);
      p.indent(() => data.cons.forEach((c) => printCon(p, c)));
      return;
    }
    case 'value':
      p.line(`value ${decl.value.name} ${decl.value.key}: ${fmtUses(decl.value.uses)}`);
      return;
    case 'class': {
      const cls = decl.class;
      p.line(`class ${cls.name} ${cls.key}`);
      p.indent(() => cls.methods.forEach((m) => p.line(`${m.name} ${m.key}: ${fmtUses(m.uses)}`)));
      return;
    }
  }
}

/** Human-readable dump of parsed modules, in the order given. */
export function printModules(modules: readonly Module[]): string {
  const p = new Printer();
  for (const m of modules) {
    p.line(`module ${m.name} (${m.path})`);
    p.indent(() => {
      for (const imp of m.imports) p.line(`import ${imp}`);
      for (const d of m.decls) printDecl(p, d);
    });
  }
  return p.toString();
}

function fmtTypeTerm(t: TypeTerm): string {
  if (t.kind === 'var') return `var ${t.name.occName} ${t.name.key}`;
  return `${t.label ?? 'struct'} [${t.args.join(', ')}]`;
}

function fmtEntry(e: IdentifierEntry<number>): string {
  const who = e.identifier.kind === 'module' ? `module ${e.identifier.moduleName}` : `${e.identifier.name.occName} ${e.identifier.name.key}`;
  const ctx = e.details.context.map(describeContext).join(', ');
  const type = e.details.type === null ? '' : ` :: ${e.details.type}`;
  return `${who} <${ctx}>${type}`;
}

function printNode(p: Printer, node: TreeNode<number>): void {
  const anns = node.annotations.map(describeAnnotation).join(', ');
  p.line(`node [${anns}]${node.span ? ` @ ${node.span}` : ''}`);
  p.indent(() => {
    if (node.types.length) p.line(`types: ${node.types.join(' ')}`);
    for (const e of node.identifiers) p.line(`id: ${fmtEntry(e)}`);
    for (const c of node.children) printNode(p, c);
  });
}

/** Raw lexical tree and type table of one dump, before any parsing. */
export function printDumpTree(dump: ModuleDump): string {
  const p = new Printer();
  p.line(`module ${dump.moduleName} (${dump.path})`);
  p.indent(() => {
    p.line('type table');
    p.indent(() => dump.types.forEach((t, i) => p.line(`${i}: ${fmtTypeTerm(t)}`)));
    for (const root of dump.roots) printNode(p, root);
  });
  return p.toString();
}
