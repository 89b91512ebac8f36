import fg from 'fast-glob';
import fs from 'node:fs/promises';
import path from 'node:path';
import { stableStringify } from '../output/deterministicJson';
import { toPosixPath } from '../util/path';

export type DumpScanOptions = {
  sourceRoot: string;
  /** Globs selecting dump files, relative to sourceRoot (default: every `*.dump.json`). */
  includeGlobs?: string[];
  /** Additional exclude globs (evaluated relative to sourceRoot). */
  excludeGlobs?: string[];
  /** Optional safety cap; if set, results are truncated deterministically after sorting. */
  maxFiles?: number;
};

export const DEFAULT_DUMP_INCLUDES = ['**/*.dump.json'];

const DEFAULT_EXCLUDES = ['**/node_modules/**', '**/.git/**', '**/dist/**'];

/**
 * Deterministically discovers dump files below a directory.
 * Returns a stable, sorted list of relative paths (posix-style) from sourceRoot.
 */
export async function scanDumpFiles(opts: DumpScanOptions): Promise<string[]> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const include = opts.includeGlobs && opts.includeGlobs.length > 0 ? opts.includeGlobs : DEFAULT_DUMP_INCLUDES;

  const matches = await fg(include, {
    cwd: sourceRoot,
    onlyFiles: true,
    unique: true,
    dot: true,
    followSymbolicLinks: false,
    ignore: [...DEFAULT_EXCLUDES, ...(opts.excludeGlobs ?? [])],
  });

  const rel = matches.map(toPosixPath);
  rel.sort((a, b) => a.localeCompare(b));
  if (opts.maxFiles && opts.maxFiles > 0 && rel.length > opts.maxFiles) {
    return rel.slice(0, opts.maxFiles);
  }
  return rel;
}

export type DumpInventory = {
  schema: 'dump-inventory-v1';
  sourceRoot: string;
  files: string[];
};

export async function buildDumpInventory(opts: DumpScanOptions): Promise<DumpInventory> {
  const files = await scanDumpFiles(opts);
  return {
    schema: 'dump-inventory-v1',
    sourceRoot: path.resolve(opts.sourceRoot),
    files,
  };
}

export async function writeDumpInventoryFile(outFile: string, inv: DumpInventory): Promise<void> {
  const abs = path.resolve(outFile);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, stableStringify(inv), 'utf8');
}
