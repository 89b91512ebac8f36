import fs from 'node:fs/promises';
import Ajv2020 from 'ajv/dist/2020';
import type { ErrorObject } from 'ajv';

import { SymbolKey } from '../model/symbolKey';
import type { IdentifierEntry, ModuleDump, Name, TreeNode, TypeTerm } from '../tree/tree';
import { classifyAnnotation, classifyContext } from '../tree/vocabulary';
import { toPosixPath } from '../util/path';
import type { RawDumpFile, RawIdentifier, RawName, RawNode, RawTypeTerm } from './dumpJson';
import dumpSchema from './schema/interface-dump-v1.json';

export class DumpFormatError extends Error {
  constructor(
    readonly reason: string,
    readonly file: string,
    readonly details: string[] = [],
  ) {
    super(details.length ? `${reason}: ${file}\n${details.join('\n')}` : `${reason}: ${file}`);
    this.name = 'DumpFormatError';
  }
}

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validateDump = ajv.compile(dumpSchema);

function isRawDumpFile(data: unknown): data is RawDumpFile {
  return validateDump(data);
}

function formatSchemaError(e: ErrorObject): string {
  return `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`;
}

/**
 * Parse and validate the JSON text of one dump file.
 *
 * @param file - used in error messages only
 * @throws DumpFormatError when the text is not JSON, does not match the schema, carries an
 * integer key too large to be exact, or refers to a type index outside the module's type table
 */
export function parseDumpJson(text: string, file: string): ModuleDump {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e: unknown) {
    throw new DumpFormatError('Dump is not valid JSON', file, [e instanceof Error ? e.message : String(e)]);
  }

  if (!isRawDumpFile(data)) {
    throw new DumpFormatError('Dump does not match interface-dump-v1', file, (validateDump.errors ?? []).map(formatSchemaError));
  }

  const inexact = findInexactKeys(data);
  if (inexact.length > 0) {
    throw new DumpFormatError('Dump has symbol keys that lost precision', file, inexact);
  }

  const outOfRange = findOutOfRangeIndices(data);
  if (outOfRange.length > 0) {
    throw new DumpFormatError('Dump refers to missing type table entries', file, outOfRange);
  }

  return toModuleDump(data);
}

export async function loadDumpFile(filePath: string): Promise<ModuleDump> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (e: unknown) {
    throw new DumpFormatError('Dump could not be read', filePath, [e instanceof Error ? e.message : String(e)]);
  }
  return parseDumpJson(text, filePath);
}

/** Integer keys past 2^53 were already rounded by `JSON.parse`; such keys must arrive as strings. */
function findInexactKeys(dump: RawDumpFile): string[] {
  const problems: string[] = [];
  const check = (name: RawName, where: string) => {
    if (typeof name.key === 'number' && !Number.isSafeInteger(name.key)) {
      problems.push(`${where}/key: ${name.key} is not an exact integer (write it as a decimal string)`);
    }
  };

  dump.types.forEach((t, i) => {
    if ('var' in t) check(t.var, `/types/${i}/var`);
  });

  const walk = (node: RawNode, where: string) => {
    (node.identifiers ?? []).forEach((id, i) => {
      if ('name' in id) check(id.name, `${where}/identifiers/${i}/name`);
    });
    (node.children ?? []).forEach((c, i) => walk(c, `${where}/children/${i}`));
  };
  dump.roots.forEach((r, i) => walk(r, `/roots/${i}`));

  return problems;
}

function findOutOfRangeIndices(dump: RawDumpFile): string[] {
  const size = dump.types.length;
  const problems: string[] = [];
  const check = (index: number, where: string) => {
    if (index >= size) problems.push(`${where}: type index ${index} (table has ${size} entries)`);
  };

  dump.types.forEach((t, i) => {
    if (!('var' in t)) t.args.forEach((a) => check(a, `/types/${i}`));
  });

  const walk = (node: RawNode, where: string) => {
    (node.types ?? []).forEach((t) => check(t, `${where}/types`));
    (node.identifiers ?? []).forEach((id, i) => {
      if (id.type !== undefined && id.type !== null) check(id.type, `${where}/identifiers/${i}`);
    });
    (node.children ?? []).forEach((c, i) => walk(c, `${where}/children/${i}`));
  };
  dump.roots.forEach((r, i) => walk(r, `/roots/${i}`));

  return problems;
}

function toName(raw: RawName): Name {
  return { key: SymbolKey.of(raw.key), occName: raw.name };
}

function toTypeTerm(raw: RawTypeTerm): TypeTerm {
  if ('var' in raw) return { kind: 'var', name: toName(raw.var) };
  return { kind: 'struct', label: raw.struct ?? null, args: raw.args };
}

function toIdentifierEntry(raw: RawIdentifier): IdentifierEntry<number> {
  const details = { type: raw.type ?? null, context: raw.context.map(classifyContext) };
  if ('module' in raw) return { identifier: { kind: 'module', moduleName: raw.module }, details };
  return { identifier: { kind: 'name', name: toName(raw.name) }, details };
}

function toTreeNode(raw: RawNode): TreeNode<number> {
  return {
    span: raw.span ?? null,
    annotations: (raw.annotations ?? []).map(([category, subcategory]) => classifyAnnotation(category, subcategory)),
    types: raw.types ?? [],
    identifiers: (raw.identifiers ?? []).map(toIdentifierEntry),
    children: (raw.children ?? []).map(toTreeNode),
  };
}

function toModuleDump(raw: RawDumpFile): ModuleDump {
  return {
    moduleName: raw.module,
    path: toPosixPath(raw.path),
    roots: raw.roots.map(toTreeNode),
    types: raw.types.map(toTypeTerm),
  };
}
